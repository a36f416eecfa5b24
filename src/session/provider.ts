import type {
  ResolvedService,
  ServiceDescriptor,
  ServiceReference,
} from '../types/service.js'

/** Push notifications delivered while a watch is active */
export interface WatchEvents {
  found(reference: ServiceReference): void
  lost(reference: ServiceReference): void
}

/**
 * The network stack a session drives.
 *
 * Every operation settles exactly once. Failures reject with a
 * `ProviderError` carrying the provider's status code.
 */
export interface DiscoveryProvider {
  /** Publish a service. Fulfils with the effective (possibly renamed) name. */
  advertise(descriptor: ServiceDescriptor): Promise<string>
  /** Withdraw the published service. */
  withdraw(): Promise<void>
  /** Start watching for services of a type. */
  watch(serviceType: string, events: WatchEvents): Promise<void>
  /** Stop the active watch. */
  unwatch(): Promise<void>
  resolve(reference: ServiceReference): Promise<ResolvedService>
}
