import { Type, type Static } from '@sinclair/typebox'
import { ServiceAttributesSchema, ServiceTypeString } from './service.js'

export const NotificationMode = Type.Union([
  Type.Literal('immediate'),
  Type.Literal('queued'),
])
export type NotificationMode = Static<typeof NotificationMode>

export const LogLevel = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('silent'),
])
export type LogLevel = Static<typeof LogLevel>

/** Configuration schema for nsd.config.json */
export const NsdConfigSchema = Type.Object({
  session: Type.Object({
    excludeOwnService: Type.Boolean({ default: false }),
    notifications: NotificationMode,
  }),
  service: Type.Object({
    name: Type.String({ minLength: 1, default: 'nsd-service' }),
    type: ServiceTypeString,
    port: Type.Integer({ minimum: 1, maximum: 65535, default: 8080 }),
    attributes: ServiceAttributesSchema,
  }),
  discovery: Type.Object({
    serviceType: ServiceTypeString,
    timeoutMs: Type.Number({ minimum: 500, default: 3000 }),
  }),
  bonjour: Type.Object({
    resolveTimeoutMs: Type.Number({ minimum: 100, default: 3000 }),
    probe: Type.Boolean({ default: true }),
  }),
  logging: Type.Object({
    level: LogLevel,
  }),
})

export type NsdConfig = Static<typeof NsdConfigSchema>
