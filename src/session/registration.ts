/**
 * RegistrationController: advertise/withdraw lifecycle for the one local
 * service a session may have registered.
 *
 *   idle --register--> registering --ok--> registered --withdraw ok--> idle
 *                      registering --fail--> idle
 *
 * A register() while registered withdraws first and advertises the new
 * descriptor once the withdrawal is confirmed. Only the latest such request
 * is kept.
 */

import type { ServiceDescriptor } from '../types/service.js'
import type { SessionContext } from './context.js'
import { toSubmittedDescriptor } from './validation.js'

export type RegistrationState = 'idle' | 'registering' | 'registered'

export class RegistrationController {
  private state: RegistrationState = 'idle'
  private descriptor: Readonly<ServiceDescriptor> | null = null
  private effectiveName: string | undefined
  private withdrawing = false
  private pendingDescriptor: Readonly<ServiceDescriptor> | null = null

  constructor(private readonly context: SessionContext) {}

  get currentState(): RegistrationState {
    return this.state
  }

  /** Name the provider registered the service under, once registered */
  get registeredName(): string | undefined {
    return this.effectiveName
  }

  register(descriptor: ServiceDescriptor): void {
    const submitted = toSubmittedDescriptor(descriptor)

    if (this.state === 'registering') return

    if (this.state === 'registered') {
      this.pendingDescriptor = submitted
      this.unregister()
      return
    }

    this.advertise(submitted)
  }

  /**
   * Withdraw the registered service. The state stays `registered` until the
   * provider confirms, since the advertisement is live until then.
   */
  unregister(): void {
    if (this.state !== 'registered' || this.withdrawing) return

    this.withdrawing = true
    this.context.submit(
      (provider) => provider.withdraw(),
      () => this.onWithdrawn(),
      (err) => this.onWithdrawFailed(err),
    )
  }

  private advertise(descriptor: Readonly<ServiceDescriptor>): void {
    this.state = 'registering'
    this.descriptor = descriptor
    this.context.submit(
      (provider) => provider.advertise(descriptor),
      (name) => this.onAdvertised(name),
      (err) => this.onAdvertiseFailed(err),
    )
  }

  private onAdvertised(name: string): void {
    this.state = 'registered'
    this.effectiveName = name
    this.context.logger.debug(`Registered as "${name}"`)
    this.context.notify((listeners) => listeners.registration?.onServiceRegistered(name))
  }

  private onAdvertiseFailed(err: unknown): void {
    this.state = 'idle'
    this.descriptor = null
    this.effectiveName = undefined
    this.context.reportError('REGISTRATION_FAILED', err)
  }

  private onWithdrawn(): void {
    this.withdrawing = false
    this.state = 'idle'
    this.descriptor = null
    this.effectiveName = undefined
    const next = this.pendingDescriptor
    this.pendingDescriptor = null

    this.context.notify((listeners) => listeners.registration?.onServiceUnregistered())
    if (next) this.register(next)
  }

  private onWithdrawFailed(err: unknown): void {
    // Nothing was torn down: still registered, and the deferred
    // re-registration is dropped with the failed withdrawal.
    this.withdrawing = false
    this.pendingDescriptor = null
    this.context.reportError('UNREGISTRATION_FAILED', err)
  }
}
