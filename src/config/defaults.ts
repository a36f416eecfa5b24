import type { NsdConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: NsdConfig = {
  session: {
    excludeOwnService: false,
    notifications: 'queued',
  },
  service: {
    name: 'nsd-service',
    type: '_nsd._tcp',
    port: 8080,
    attributes: {},
  },
  discovery: {
    serviceType: '_nsd._tcp',
    timeoutMs: 3000,
  },
  bonjour: {
    resolveTimeoutMs: 3000,
    probe: true,
  },
  logging: {
    level: 'info',
  },
}
