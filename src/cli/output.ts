/**
 * Terminal output for the nsd commands. Results go to stdout, problems to
 * stderr, one plain line per write.
 */

import type { ResolvedService } from '../types/service.js'

export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Found services and completed actions */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** Host, port, addresses and TXT attributes of a resolved service */
  service(service: ResolvedService): void {
    const addresses = service.addresses.length > 0 ? service.addresses.join(', ') : 'none'
    process.stdout.write(`${service.name} (${service.type})\n`)
    process.stdout.write(`  Host:       ${service.host}:${service.port}\n`)
    process.stdout.write(`  Addresses:  ${addresses}\n`)
    for (const [key, value] of Object.entries(service.attributes)) {
      process.stdout.write(`  ${key}=${value}\n`)
    }
  },
}
