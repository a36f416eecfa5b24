/**
 * `nsd browse` -- discover services of a type for a fixed window.
 *
 * Prints each service as it is found or lost, optionally resolving it,
 * then stops discovery and prints a summary.
 */

import type { Command } from 'commander'
import { describeFailure } from '../../session/index.js'
import { createRuntime, loadCliConfig } from '../runtime.js'
import { output } from '../output.js'

interface BrowseOptions {
  config?: string
  timeout?: string
  resolve?: boolean
}

export function registerBrowseCommand(program: Command): void {
  program
    .command('browse')
    .description('Discover services of a type on the local network')
    .argument('[type]', 'service type, e.g. _http._tcp (default from config)')
    .option('-c, --config <path>', 'configuration file path')
    .option('-t, --timeout <ms>', 'scan duration in milliseconds')
    .option('-r, --resolve', 'resolve each service as it is found')
    .action((type: string | undefined, options: BrowseOptions) => {
      const config = loadCliConfig(options.config)
      if (!config) return

      const serviceType = type ?? config.discovery.serviceType
      const timeoutMs = options.timeout === undefined
        ? config.discovery.timeoutMs
        : parseInt(options.timeout, 10)
      if (isNaN(timeoutMs) || timeoutMs < 500) {
        output.error('Timeout must be at least 500ms')
        process.exit(1)
        return
      }

      const { session, provider } = createRuntime(config)

      session.setServiceListener({
        onServiceFound: (reference) => {
          output.success(reference.name)
          if (options.resolve) session.resolve(reference)
        },
        onServiceLost: (reference) => output.info(`Lost: ${reference.name}`),
      })
      session.setResolveListener({
        onServiceResolved: (service) => output.service(service),
      })
      session.setErrorListener({
        onError: (kind, code) => output.error(describeFailure(kind, code)),
      })

      output.info(`Scanning for ${serviceType} services (${timeoutMs}ms)...`)
      session.discover(serviceType)

      setTimeout(() => {
        const found = session.getKnownServices().length
        session.stopDiscovery()
        output.info('')
        if (found === 0) {
          output.info(`No ${serviceType} services found on the local network`)
        } else {
          output.info(`Found ${found} service(s)`)
        }
        void provider.destroy()
      }, timeoutMs)
    })
}
