/**
 * BonjourProvider: DiscoveryProvider over bonjour-service.
 *
 * bonjour-service speaks mDNS/DNS-SD on the wire. This adapter maps its
 * publish/find API onto the provider contract: one published service and
 * one browser at a time, failures as ProviderError status codes.
 *
 * bonjour-service has no separate resolve step; browsed services arrive
 * with SRV/TXT/A data already attached. resolve() answers from what the
 * browser has seen, or runs a short one-shot browse for the reference.
 */

import { Bonjour, type Browser, type Service } from 'bonjour-service'
import type { DiscoveryProvider, WatchEvents } from '../session/provider.js'
import { silentLogger, type Logger } from '../logging/logger.js'
import { PROVIDER_STATUS, ProviderError } from '../session/errors.js'
import type {
  ResolvedService,
  ServiceAttributes,
  ServiceDescriptor,
  ServiceReference,
} from '../types/service.js'
import { formatServiceType, parseServiceType } from './service-type.js'

export interface BonjourProviderOptions {
  /** How long resolve() browses for an unseen service (default 3000ms) */
  resolveTimeoutMs?: number
  /** Probe the network for name conflicts before announcing (default true) */
  probe?: boolean
  /** Receives errors the published service reports after it is up */
  logger?: Logger
}

const DEFAULT_RESOLVE_TIMEOUT_MS = 3000

/** TXT values may arrive as strings, buffers or booleans */
export function toAttributes(txt: unknown): ServiceAttributes {
  const attributes: ServiceAttributes = {}
  if (txt === null || typeof txt !== 'object') return attributes
  for (const [key, value] of Object.entries(txt)) {
    attributes[key] = Buffer.isBuffer(value) ? value.toString('utf-8') : String(value)
  }
  return attributes
}

export function toReference(service: Service): ServiceReference {
  return {
    name: service.name,
    type: formatServiceType(service.type, service.protocol),
  }
}

export function toResolved(service: Service): ResolvedService {
  return {
    name: service.name,
    type: formatServiceType(service.type, service.protocol),
    host: service.host,
    port: service.port,
    addresses: service.addresses ?? [],
    attributes: toAttributes(service.txt),
  }
}

export class BonjourProvider implements DiscoveryProvider {
  private bonjour: Bonjour | null = null
  private service: Service | null = null
  private browser: Browser | null = null
  private readonly seen = new Map<string, Service>()
  private readonly resolveTimeoutMs: number
  private readonly probe: boolean
  private readonly logger: Logger

  constructor(options: BonjourProviderOptions = {}) {
    this.resolveTimeoutMs = options.resolveTimeoutMs ?? DEFAULT_RESOLVE_TIMEOUT_MS
    this.probe = options.probe ?? true
    this.logger = options.logger ?? silentLogger
  }

  advertise(descriptor: ServiceDescriptor): Promise<string> {
    if (this.service) {
      return Promise.reject(new ProviderError(PROVIDER_STATUS.ALREADY_ACTIVE))
    }

    const { type, protocol } = parseServiceType(descriptor.type)

    return new Promise<string>((resolve, reject) => {
      const service = this.getBonjour().publish({
        name: descriptor.name,
        type,
        protocol,
        port: descriptor.port,
        txt: { ...descriptor.attributes },
        probe: this.probe,
      })
      this.service = service

      let up = false
      service.once('up', () => {
        up = true
        resolve(service.name)
      })
      // Stays attached for the service's lifetime; only errors before `up` fail the advertise
      service.on('error', (err: Error) => {
        if (up) {
          this.logger.warn(`Service "${service.name}" reported: ${err.message}`)
          return
        }
        if (this.service === service) this.service = null
        reject(new ProviderError(PROVIDER_STATUS.INTERNAL_ERROR, err.message))
      })
    })
  }

  withdraw(): Promise<void> {
    if (!this.service || !this.bonjour) {
      return Promise.reject(new ProviderError(PROVIDER_STATUS.INTERNAL_ERROR, 'No service published'))
    }

    const bonjour = this.bonjour
    return new Promise<void>((resolve) => {
      bonjour.unpublishAll(() => {
        this.service = null
        resolve()
      })
    })
  }

  watch(serviceType: string, events: WatchEvents): Promise<void> {
    if (this.browser) {
      return Promise.reject(new ProviderError(PROVIDER_STATUS.ALREADY_ACTIVE))
    }

    const browser = this.getBonjour().find(parseServiceType(serviceType))
    browser.on('up', (service: Service) => {
      this.seen.set(service.name, service)
      events.found(toReference(service))
    })
    browser.on('down', (service: Service) => {
      this.seen.delete(service.name)
      events.lost(toReference(service))
    })
    this.browser = browser

    return Promise.resolve()
  }

  unwatch(): Promise<void> {
    if (!this.browser) {
      return Promise.reject(new ProviderError(PROVIDER_STATUS.INTERNAL_ERROR, 'No discovery running'))
    }

    this.browser.stop()
    this.browser = null
    this.seen.clear()
    return Promise.resolve()
  }

  resolve(reference: ServiceReference): Promise<ResolvedService> {
    const known = this.seen.get(reference.name)
    if (known) return Promise.resolve(toResolved(known))

    return new Promise<ResolvedService>((resolve, reject) => {
      const browser = this.getBonjour().find(parseServiceType(reference.type))

      const timer = setTimeout(() => {
        browser.stop()
        reject(new ProviderError(
          PROVIDER_STATUS.INTERNAL_ERROR,
          `Timed out resolving "${reference.name}"`,
        ))
      }, this.resolveTimeoutMs)

      browser.on('up', (service: Service) => {
        if (service.name !== reference.name) return
        clearTimeout(timer)
        browser.stop()
        resolve(toResolved(service))
      })
    })
  }

  /**
   * Stop browsing, unpublish and release the multicast socket.
   * Safe to call more than once.
   */
  async destroy(): Promise<void> {
    if (!this.bonjour) return

    const bonjour = this.bonjour
    this.browser?.stop()
    this.browser = null
    this.seen.clear()

    return new Promise<void>((resolve) => {
      bonjour.unpublishAll(() => {
        bonjour.destroy()
        this.bonjour = null
        this.service = null
        resolve()
      })
    })
  }

  private getBonjour(): Bonjour {
    if (!this.bonjour) {
      this.bonjour = new Bonjour()
    }
    return this.bonjour
  }
}
