/**
 * TypeBox schemas for the values that flow through a discovery session.
 *
 * Attribute keys follow RFC 6763 Section 6 (TXT record key/value pairs);
 * insertion order of `attributes` is preserved end to end.
 */

import { Type, type Static } from '@sinclair/typebox'

/** DNS-SD service type, e.g. `_http._tcp` */
export const ServiceTypeString = Type.String({ minLength: 1 })
export type ServiceTypeString = Static<typeof ServiceTypeString>

/** TXT record key-value pairs */
export const ServiceAttributesSchema = Type.Record(Type.String(), Type.String())
export type ServiceAttributes = Static<typeof ServiceAttributesSchema>

/** A local service to advertise */
export const ServiceDescriptorSchema = Type.Object({
  /** Requested instance name (the provider may rename it on conflict) */
  name: Type.String({ minLength: 1 }),
  type: ServiceTypeString,
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  attributes: Type.Optional(ServiceAttributesSchema),
})
export type ServiceDescriptor = Static<typeof ServiceDescriptorSchema>

/** A discovered, not yet resolved, peer service. Identity is `name`. */
export const ServiceReferenceSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  type: ServiceTypeString,
})
export type ServiceReference = Static<typeof ServiceReferenceSchema>

/** A peer service with connectable details */
export const ResolvedServiceSchema = Type.Object({
  name: Type.String(),
  type: Type.String(),
  /** Target hostname from the SRV record */
  host: Type.String(),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  /** Resolved IPv4/IPv6 addresses */
  addresses: Type.Array(Type.String()),
  attributes: ServiceAttributesSchema,
})
export type ResolvedService = Static<typeof ResolvedServiceSchema>
