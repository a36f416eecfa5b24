export { DiscoverySession, createDiscoverySession } from './session.js'
export type { DiscoverySessionOptions } from './session.js'

export { RegistrationController } from './registration.js'
export type { RegistrationState } from './registration.js'
export { DiscoveryController } from './discovery.js'
export type { DiscoveryState } from './discovery.js'
export { Resolver } from './resolver.js'

export { SessionContext } from './context.js'
export type {
  ErrorListener,
  ServiceListener,
  ResolveListener,
  RegistrationListener,
  SessionListeners,
} from './context.js'

export type { DiscoveryProvider, WatchEvents } from './provider.js'
export { immediateSink, createQueuedSink } from './sink.js'
export type { NotificationSink } from './sink.js'

export {
  PROVIDER_STATUS,
  ProviderError,
  SessionError,
  getErrorMessage,
  toProviderCode,
  describeFailure,
} from './errors.js'
export type { ErrorKind, SessionErrorCode } from './errors.js'
