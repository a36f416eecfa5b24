/**
 * DiscoverySession: the public face of the session.
 *
 * Composes the registration controller, the discovery controller and the
 * resolver over one provider. Every operation returns immediately; outcomes
 * arrive through the listeners, in event order, via the notification sink.
 */

import type { NsdConfig } from '../types/config.js'
import type { ServiceDescriptor, ServiceReference } from '../types/service.js'
import { silentLogger, type Logger } from '../logging/logger.js'
import {
  SessionContext,
  type ErrorListener,
  type RegistrationListener,
  type ResolveListener,
  type ServiceListener,
} from './context.js'
import type { DiscoveryProvider } from './provider.js'
import { createQueuedSink, immediateSink, type NotificationSink } from './sink.js'
import { RegistrationController, type RegistrationState } from './registration.js'
import { DiscoveryController, type DiscoveryState } from './discovery.js'
import { Resolver } from './resolver.js'

export interface DiscoverySessionOptions {
  /** Where listener callbacks run (default: immediately) */
  sink?: NotificationSink
  logger?: Logger
  /** Hide our own registered service from discovery results (default false) */
  excludeOwnService?: boolean
}

export class DiscoverySession {
  private readonly context: SessionContext
  private readonly registration: RegistrationController
  private readonly discovery: DiscoveryController
  private readonly resolver: Resolver

  constructor(provider: DiscoveryProvider, options: DiscoverySessionOptions = {}) {
    this.context = new SessionContext(
      provider,
      options.sink ?? immediateSink,
      options.logger ?? silentLogger,
    )
    this.registration = new RegistrationController(this.context)
    this.discovery = new DiscoveryController(
      this.context,
      () => this.registration.registeredName,
    )
    this.resolver = new Resolver(this.context)
    this.discovery.setExcludeOwnService(options.excludeOwnService ?? false)
  }

  /**
   * Advertise a service on the local network. Replaces any service already
   * registered by this session; ignored while a registration is in flight.
   *
   * @throws SessionError when the descriptor is invalid
   */
  register(descriptor: ServiceDescriptor): void {
    this.registration.register(descriptor)
  }

  /** Withdraw the registered service. No effect if nothing is registered. */
  unregister(): void {
    this.registration.unregister()
  }

  /**
   * Discover services of a type, e.g. `_http._tcp`. Restarts discovery if
   * it is already running; known services are cleared right away.
   *
   * @throws SessionError when the service type is empty
   */
  discover(serviceType: string): void {
    this.discovery.discover(serviceType)
  }

  /** Stop discovery. No effect unless discovery is active. */
  stopDiscovery(): void {
    this.discovery.stopDiscovery()
  }

  /**
   * Resolve a discovered service to host, port and attributes.
   *
   * @throws SessionError when the reference is invalid
   */
  resolve(reference: ServiceReference): void {
    this.resolver.resolve(reference)
  }

  /** Copy of the services found by the current discovery */
  getKnownServices(): ServiceReference[] {
    return this.discovery.getKnownServices()
  }

  /**
   * Name the service is registered under. The provider may have changed it
   * from the requested name to avoid a conflict on the network.
   */
  getRegisteredName(): string | undefined {
    return this.registration.registeredName
  }

  /** Call before discover() to leave our own service out of the results. */
  setExcludeOwnService(exclude: boolean): void {
    this.discovery.setExcludeOwnService(exclude)
  }

  get registrationState(): RegistrationState {
    return this.registration.currentState
  }

  get discoveryState(): DiscoveryState {
    return this.discovery.currentState
  }

  setErrorListener(listener: ErrorListener | undefined): void {
    this.context.listeners.error = listener
  }

  setServiceListener(listener: ServiceListener | undefined): void {
    this.context.listeners.service = listener
  }

  setResolveListener(listener: ResolveListener | undefined): void {
    this.context.listeners.resolve = listener
  }

  setRegistrationListener(listener: RegistrationListener | undefined): void {
    this.context.listeners.registration = listener
  }
}

/**
 * Build a session from loaded configuration.
 */
export function createDiscoverySession(
  provider: DiscoveryProvider,
  config: NsdConfig,
  logger: Logger = silentLogger,
): DiscoverySession {
  return new DiscoverySession(provider, {
    sink: config.session.notifications === 'queued' ? createQueuedSink() : immediateSink,
    logger,
    excludeOwnService: config.session.excludeOwnService,
  })
}
