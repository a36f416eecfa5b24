import type { TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import {
  ServiceDescriptorSchema,
  ServiceReferenceSchema,
  ServiceTypeString,
  type ServiceDescriptor,
  type ServiceReference,
} from '../types/service.js'
import { SessionError } from './errors.js'

function firstError(schema: TSchema, value: unknown): string {
  const [error] = [...Value.Errors(schema, value)]
  return error ? `${error.path || '/'}: ${error.message}` : 'invalid value'
}

/**
 * Validate a descriptor and return a frozen copy, so later changes by the
 * caller cannot reach the advertised service.
 */
export function toSubmittedDescriptor(descriptor: ServiceDescriptor): Readonly<ServiceDescriptor> {
  if (!Value.Check(ServiceDescriptorSchema, descriptor)) {
    throw new SessionError(
      'INVALID_DESCRIPTOR',
      `Invalid service descriptor (${firstError(ServiceDescriptorSchema, descriptor)})`,
    )
  }
  const copy: ServiceDescriptor = {
    name: descriptor.name,
    type: descriptor.type,
    port: descriptor.port,
  }
  if (descriptor.attributes !== undefined) {
    copy.attributes = Object.freeze({ ...descriptor.attributes })
  }
  return Object.freeze(copy)
}

export function assertServiceType(serviceType: string): void {
  if (!Value.Check(ServiceTypeString, serviceType)) {
    throw new SessionError('INVALID_SERVICE_TYPE', 'Service type must be a non-empty string')
  }
}

export function assertReference(reference: ServiceReference): void {
  if (!Value.Check(ServiceReferenceSchema, reference)) {
    throw new SessionError(
      'INVALID_REFERENCE',
      `Invalid service reference (${firstError(ServiceReferenceSchema, reference)})`,
    )
  }
}
