/**
 * `nsd advertise` -- register a service and keep it on the network
 * until SIGINT or SIGTERM, then withdraw it.
 */

import type { Command } from 'commander'
import { describeFailure, SessionError } from '../../session/index.js'
import type { ServiceDescriptor } from '../../types/service.js'
import { createRuntime, loadCliConfig } from '../runtime.js'
import { output } from '../output.js'

interface AdvertiseOptions {
  config?: string
  name?: string
  type?: string
  port?: string
  txt?: string[]
}

/** Parse `key=value` pairs; returns the offending pair on failure. */
export function parseAttributes(
  pairs: string[],
): { attributes: Record<string, string> } | { invalid: string } {
  const attributes: Record<string, string> = {}
  for (const pair of pairs) {
    const separator = pair.indexOf('=')
    if (separator <= 0) return { invalid: pair }
    attributes[pair.slice(0, separator)] = pair.slice(separator + 1)
  }
  return { attributes }
}

export function registerAdvertiseCommand(program: Command): void {
  program
    .command('advertise')
    .description('Advertise a service on the local network until interrupted')
    .option('-c, --config <path>', 'configuration file path')
    .option('-n, --name <name>', 'service instance name')
    .option('-t, --type <type>', 'service type, e.g. _http._tcp')
    .option('-p, --port <port>', 'service port')
    .option('--txt <pairs...>', 'TXT attributes as key=value')
    .action((options: AdvertiseOptions) => {
      const config = loadCliConfig(options.config)
      if (!config) return

      const port = options.port === undefined ? config.service.port : parseInt(options.port, 10)
      if (isNaN(port)) {
        output.error(`Invalid port: ${options.port}`)
        process.exit(1)
        return
      }

      const parsed = parseAttributes(options.txt ?? [])
      if ('invalid' in parsed) {
        output.error(`Invalid TXT attribute "${parsed.invalid}", expected key=value`)
        process.exit(1)
        return
      }

      const descriptor: ServiceDescriptor = {
        name: options.name ?? config.service.name,
        type: options.type ?? config.service.type,
        port,
        attributes: { ...config.service.attributes, ...parsed.attributes },
      }

      const { session, provider } = createRuntime(config)

      const shutdown = (): void => {
        if (session.registrationState === 'registered') {
          output.info('Withdrawing advertisement...')
          session.unregister()
          return
        }
        void release()
      }

      const release = async (): Promise<void> => {
        process.off('SIGINT', shutdown)
        process.off('SIGTERM', shutdown)
        await provider.destroy()
      }

      session.setRegistrationListener({
        onServiceRegistered: (name) => {
          output.success(`Advertising "${name}" as ${descriptor.type} on port ${descriptor.port}`)
          output.info('Press Ctrl+C to stop.')
        },
        onServiceUnregistered: () => {
          output.info('Advertisement withdrawn')
          void release()
        },
      })
      session.setErrorListener({
        onError: (kind, code) => {
          output.error(describeFailure(kind, code))
          void release().then(() => process.exit(1))
        },
      })

      process.on('SIGINT', shutdown)
      process.on('SIGTERM', shutdown)

      try {
        session.register(descriptor)
      } catch (err) {
        if (err instanceof SessionError) {
          output.error(err.message)
          void release().then(() => process.exit(1))
          return
        }
        throw err
      }
    })
}
