/**
 * DiscoveryController: watch/unwatch lifecycle for one service type, plus
 * the list of peer services currently believed to be live.
 *
 *   idle --discover--> starting --ok--> active --unwatch ok--> idle
 *                      starting --fail--> idle
 */

import type { ServiceReference } from '../types/service.js'
import type { SessionContext } from './context.js'
import type { WatchEvents } from './provider.js'
import { assertServiceType } from './validation.js'

export type DiscoveryState = 'idle' | 'starting' | 'active'

export class DiscoveryController {
  private state: DiscoveryState = 'idle'
  private serviceType: string | null = null
  private unwatching = false
  private pendingServiceType: string | null = null
  private excludeOwn = false
  /** Bumped on every watch; pushes from older watches are ignored */
  private generation = 0
  private readonly services: ServiceReference[] = []

  constructor(
    private readonly context: SessionContext,
    private readonly ownServiceName: () => string | undefined,
  ) {}

  get currentState(): DiscoveryState {
    return this.state
  }

  setExcludeOwnService(exclude: boolean): void {
    this.excludeOwn = exclude
  }

  /** Snapshot of the known services; later changes do not show up in it. */
  getKnownServices(): ServiceReference[] {
    return [...this.services]
  }

  /**
   * Start discovering `serviceType`. Results from any earlier discovery are
   * dropped immediately. If a watch is already active it is stopped first
   * and the new one starts once the stop is confirmed.
   */
  discover(serviceType: string): void {
    assertServiceType(serviceType)
    this.services.length = 0

    if (this.state === 'starting') return

    if (this.state === 'active') {
      this.pendingServiceType = serviceType
      this.stopDiscovery()
      return
    }

    this.watch(serviceType)
  }

  stopDiscovery(): void {
    if (this.state !== 'active' || this.unwatching) return

    this.unwatching = true
    this.context.submit(
      (provider) => provider.unwatch(),
      () => this.onUnwatched(),
      (err) => this.onUnwatchFailed(err),
    )
  }

  private watch(serviceType: string): void {
    this.state = 'starting'
    this.serviceType = serviceType
    const generation = ++this.generation
    const current = (): boolean => generation === this.generation && this.state !== 'idle'

    const events: WatchEvents = {
      found: (reference) => {
        if (current()) this.onFound(reference)
      },
      lost: (reference) => {
        if (current()) this.onLost(reference)
      },
    }

    this.context.submit(
      (provider) => provider.watch(serviceType, events),
      () => this.onWatchStarted(),
      (err) => this.onWatchFailed(err),
    )
  }

  private onWatchStarted(): void {
    this.state = 'active'
    this.context.logger.debug(`Discovering ${this.serviceType ?? ''}`)
  }

  private onWatchFailed(err: unknown): void {
    this.state = 'idle'
    this.serviceType = null
    this.context.reportError('START_DISCOVERY_FAILED', err)
  }

  private onUnwatched(): void {
    this.unwatching = false
    this.state = 'idle'
    this.serviceType = null

    const next = this.pendingServiceType
    this.pendingServiceType = null
    if (next !== null) {
      this.discover(next)
    }
  }

  private onUnwatchFailed(err: unknown): void {
    this.unwatching = false
    this.pendingServiceType = null
    this.context.reportError('STOP_DISCOVERY_FAILED', err)
  }

  private onFound(reference: ServiceReference): void {
    if (this.excludeOwn && reference.name === this.ownServiceName()) return

    // The provider does not report a name twice without a loss in between
    this.services.push(reference)
    this.context.notify((listeners) => listeners.service?.onServiceFound(reference))
  }

  private onLost(reference: ServiceReference): void {
    const index = this.services.findIndex((s) => s.name === reference.name)
    if (index >= 0) {
      this.services.splice(index, 1)
    }
    this.context.notify((listeners) => listeners.service?.onServiceLost(reference))
  }
}
