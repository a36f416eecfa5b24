import type { ServiceReference } from '../types/service.js'
import type { SessionContext } from './context.js'
import { assertReference } from './validation.js'

/**
 * Resolver: passes every resolve straight to the provider. Concurrent
 * resolves, including several for the same reference, are all issued.
 */
export class Resolver {
  constructor(private readonly context: SessionContext) {}

  resolve(reference: ServiceReference): void {
    assertReference(reference)

    this.context.submit(
      (provider) => provider.resolve(reference),
      (resolved) => this.context.notify((listeners) => listeners.resolve?.onServiceResolved(resolved)),
      (err) => this.context.reportError('RESOLVE_FAILED', err),
    )
  }
}
