// Services
export {
  ServiceTypeString,
  ServiceAttributesSchema,
  ServiceDescriptorSchema,
  ServiceReferenceSchema,
  ResolvedServiceSchema,
} from './service.js'
export type {
  ServiceAttributes,
  ServiceDescriptor,
  ServiceReference,
  ResolvedService,
} from './service.js'

// Configuration
export { NsdConfigSchema, NotificationMode, LogLevel } from './config.js'
export type { NsdConfig } from './config.js'
