export { BonjourProvider, toAttributes, toReference, toResolved } from './provider.js'
export type { BonjourProviderOptions } from './provider.js'
export { parseServiceType, formatServiceType } from './service-type.js'
export type { ParsedServiceType, ServiceProtocol } from './service-type.js'
