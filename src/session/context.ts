import type { Logger } from '../logging/logger.js'
import type { DiscoveryProvider } from './provider.js'
import type { NotificationSink } from './sink.js'
import { describeFailure, toProviderCode, type ErrorKind } from './errors.js'
import type { ResolvedService, ServiceReference } from '../types/service.js'

/** Invoked when any session operation fails at the provider */
export interface ErrorListener {
  onError(kind: ErrorKind, code: number): void
}

/** Invoked as peer services of the watched type come and go */
export interface ServiceListener {
  /** `reference` is unresolved; pass it to `resolve()` for host and port. */
  onServiceFound(reference: ServiceReference): void
  /** Compare by `name` against previously found references. */
  onServiceLost(reference: ServiceReference): void
}

export interface ResolveListener {
  onServiceResolved(service: ResolvedService): void
}

/** Invoked as the local advertisement goes live and is withdrawn */
export interface RegistrationListener {
  onServiceRegistered(name: string): void
  onServiceUnregistered(): void
}

export interface SessionListeners {
  error?: ErrorListener
  service?: ServiceListener
  resolve?: ResolveListener
  registration?: RegistrationListener
}

/**
 * State shared by the three controllers of one session: the provider,
 * the notification sink, the logger and the registered listeners.
 */
export class SessionContext {
  readonly listeners: SessionListeners = {}

  constructor(
    readonly provider: DiscoveryProvider,
    private readonly sink: NotificationSink,
    readonly logger: Logger,
  ) {}

  /**
   * Issue a provider call and route its settlement to a transition.
   * A provider that throws synchronously is treated as a rejection.
   */
  submit<T>(
    operation: (provider: DiscoveryProvider) => Promise<T>,
    onSuccess: (value: T) => void,
    onFailure: (err: unknown) => void,
  ): void {
    let pending: Promise<T>
    try {
      pending = operation(this.provider)
    } catch (err) {
      pending = Promise.reject(err)
    }
    void pending.then(onSuccess, onFailure)
  }

  /**
   * Deliver a notification to the listeners through the sink. A listener
   * that throws is logged; the error never reaches a transition or the
   * provider.
   */
  notify(deliver: (listeners: SessionListeners) => void): void {
    this.sink(() => {
      try {
        deliver(this.listeners)
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        this.logger.warn(`Listener threw: ${message}`)
      }
    })
  }

  /** Log a provider failure and forward it to the error listener. */
  reportError(kind: ErrorKind, err: unknown): void {
    const code = toProviderCode(err)
    this.logger.warn(describeFailure(kind, code))
    this.notify((listeners) => listeners.error?.onError(kind, code))
  }
}
