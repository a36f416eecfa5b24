import type { Command } from 'commander'
import { describeFailure } from '../../session/index.js'
import { createRuntime, loadCliConfig } from '../runtime.js'
import { output } from '../output.js'

/**
 * Register the `resolve` command: look up host, port and TXT attributes
 * of one named service.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a service instance to host, port and attributes')
    .argument('<name>', 'service instance name')
    .option('-t, --type <type>', 'service type (default from config)')
    .option('-c, --config <path>', 'configuration file path')
    .action((name: string, options: { type?: string; config?: string }) => {
      const config = loadCliConfig(options.config)
      if (!config) return

      const { session, provider } = createRuntime(config)

      session.setResolveListener({
        onServiceResolved: (service) => {
          output.service(service)
          void provider.destroy()
        },
      })
      session.setErrorListener({
        onError: (kind, code) => {
          output.error(describeFailure(kind, code))
          void provider.destroy().then(() => process.exit(1))
        },
      })

      session.resolve({ name, type: options.type ?? config.discovery.serviceType })
    })
}
