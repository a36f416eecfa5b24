/**
 * Error types for the discovery session.
 *
 * Provider failures carry an opaque numeric status code and are reported
 * through the error listener, never thrown at the caller. `SessionError` is
 * thrown synchronously for invalid arguments.
 */

/** Status codes a provider rejects with */
export const PROVIDER_STATUS = {
  INTERNAL_ERROR: 0,
  ALREADY_ACTIVE: 3,
  MAX_LIMIT: 4,
} as const

export type ErrorKind =
  | 'REGISTRATION_FAILED'
  | 'UNREGISTRATION_FAILED'
  | 'START_DISCOVERY_FAILED'
  | 'STOP_DISCOVERY_FAILED'
  | 'RESOLVE_FAILED'

export type SessionErrorCode =
  | 'INVALID_DESCRIPTOR'
  | 'INVALID_SERVICE_TYPE'
  | 'INVALID_REFERENCE'

export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'SessionError'
  }
}

export class ProviderError extends Error {
  constructor(
    public readonly code: number,
    message: string = getErrorMessage(code),
  ) {
    super(message)
    this.name = 'ProviderError'
  }
}

/** Extract the provider status code from a rejection reason. */
export function toProviderCode(err: unknown): number {
  if (err instanceof ProviderError) return err.code
  return PROVIDER_STATUS.INTERNAL_ERROR
}

/** Human-readable message for a provider status code. */
export function getErrorMessage(code: number): string {
  switch (code) {
    case PROVIDER_STATUS.ALREADY_ACTIVE:
      return 'The operation failed because it is already active.'
    case PROVIDER_STATUS.INTERNAL_ERROR:
      return 'Internal error.'
    case PROVIDER_STATUS.MAX_LIMIT:
      return 'The operation failed because the maximum outstanding requests' +
        ' from the applications have reached.'
    default:
      return 'Unknown error.'
  }
}

const OPERATION_LABEL: Record<ErrorKind, string> = {
  REGISTRATION_FAILED: 'registration',
  UNREGISTRATION_FAILED: 'unregistration',
  START_DISCOVERY_FAILED: 'startDiscovery',
  STOP_DISCOVERY_FAILED: 'stopDiscovery',
  RESOLVE_FAILED: 'resolve',
}

/** Log line for a reported failure, e.g. "registration failed: Internal error." */
export function describeFailure(kind: ErrorKind, code: number): string {
  return `${OPERATION_LABEL[kind]} failed: ${getErrorMessage(code)}`
}
