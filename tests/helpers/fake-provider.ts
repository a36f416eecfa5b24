/**
 * FakeProvider: in-process DiscoveryProvider whose operations stay pending
 * until the test settles them, so every interleaving can be driven by hand.
 *
 * Every call is recorded in `calls` (e.g. "advertise:Foo", "withdraw",
 * "watch:_http._tcp") in issue order.
 */

import type { DiscoveryProvider, WatchEvents } from '../../src/session/provider.js'
import { ProviderError } from '../../src/session/errors.js'
import type {
  ResolvedService,
  ServiceDescriptor,
  ServiceReference,
} from '../../src/types/service.js'

class Deferred<T> {
  readonly promise: Promise<T>
  resolve: (value: T) => void = () => {}
  reject: (reason: unknown) => void = () => {}

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve
      this.reject = reject
    })
  }
}

interface PendingAdvertise {
  descriptor: ServiceDescriptor
  deferred: Deferred<string>
}

interface PendingResolve {
  reference: ServiceReference
  deferred: Deferred<ResolvedService>
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Let every settled provider call reach the session, and let a queued
 * sink drain what those transitions enqueued.
 */
export async function flush(): Promise<void> {
  await nextTurn()
  await nextTurn()
}

export function ref(name: string, type: string = '_http._tcp'): ServiceReference {
  return { name, type }
}

export class FakeProvider implements DiscoveryProvider {
  readonly calls: string[] = []
  /** Descriptors exactly as handed to advertise() */
  readonly advertised: ServiceDescriptor[] = []
  /** Highest number of advertise calls pending at once */
  maxAdvertisesInFlight = 0
  destroyed = false

  private readonly advertises: PendingAdvertise[] = []
  private readonly withdraws: Deferred<void>[] = []
  private readonly watches: Deferred<void>[] = []
  private readonly unwatches: Deferred<void>[] = []
  private readonly resolves: PendingResolve[] = []
  private readonly watchEvents: WatchEvents[] = []

  advertise(descriptor: ServiceDescriptor): Promise<string> {
    this.calls.push(`advertise:${descriptor.name}`)
    this.advertised.push(descriptor)
    const deferred = new Deferred<string>()
    this.advertises.push({ descriptor, deferred })
    this.maxAdvertisesInFlight = Math.max(this.maxAdvertisesInFlight, this.advertises.length)
    return deferred.promise
  }

  withdraw(): Promise<void> {
    this.calls.push('withdraw')
    const deferred = new Deferred<void>()
    this.withdraws.push(deferred)
    return deferred.promise
  }

  watch(serviceType: string, events: WatchEvents): Promise<void> {
    this.calls.push(`watch:${serviceType}`)
    const deferred = new Deferred<void>()
    this.watches.push(deferred)
    this.watchEvents.push(events)
    return deferred.promise
  }

  unwatch(): Promise<void> {
    this.calls.push('unwatch')
    const deferred = new Deferred<void>()
    this.unwatches.push(deferred)
    return deferred.promise
  }

  resolve(reference: ServiceReference): Promise<ResolvedService> {
    this.calls.push(`resolve:${reference.name}`)
    const deferred = new Deferred<ResolvedService>()
    this.resolves.push({ reference, deferred })
    return deferred.promise
  }

  /** Mirrors BonjourProvider.destroy() so CLI code can release it. */
  destroy(): Promise<void> {
    this.destroyed = true
    return Promise.resolve()
  }

  get pendingAdvertises(): number {
    return this.advertises.length
  }

  get pendingResolves(): number {
    return this.resolves.length
  }

  /** Settle the oldest advertise; the effective name defaults to the requested one. */
  succeedAdvertise(name?: string): void {
    const pending = this.take(this.advertises, 'advertise')
    pending.deferred.resolve(name ?? pending.descriptor.name)
  }

  failAdvertise(code: number): void {
    this.take(this.advertises, 'advertise').deferred.reject(new ProviderError(code))
  }

  succeedWithdraw(): void {
    this.take(this.withdraws, 'withdraw').resolve()
  }

  failWithdraw(code: number): void {
    this.take(this.withdraws, 'withdraw').reject(new ProviderError(code))
  }

  succeedWatch(): void {
    this.take(this.watches, 'watch').resolve()
  }

  failWatch(code: number): void {
    this.take(this.watches, 'watch').reject(new ProviderError(code))
  }

  succeedUnwatch(): void {
    this.take(this.unwatches, 'unwatch').resolve()
  }

  failUnwatch(code: number): void {
    this.take(this.unwatches, 'unwatch').reject(new ProviderError(code))
  }

  succeedResolve(resolved: ResolvedService): void {
    this.take(this.resolves, 'resolve').deferred.resolve(resolved)
  }

  failResolve(code: number): void {
    this.take(this.resolves, 'resolve').deferred.reject(new ProviderError(code))
  }

  /** Push a found event through the most recent watch (or an earlier one by index). */
  found(reference: ServiceReference, watchIndex: number = this.watchEvents.length - 1): void {
    this.events(watchIndex).found(reference)
  }

  lost(reference: ServiceReference, watchIndex: number = this.watchEvents.length - 1): void {
    this.events(watchIndex).lost(reference)
  }

  private events(index: number): WatchEvents {
    const events = this.watchEvents[index]
    if (!events) throw new Error(`No watch #${index} was issued`)
    return events
  }

  private take<T>(queue: T[], operation: string): T {
    const next = queue.shift()
    if (next === undefined) throw new Error(`No pending ${operation} to settle`)
    return next
  }
}
