import { loadConfig, ConfigError } from '../config/index.js'
import { BonjourProvider } from '../bonjour/index.js'
import { createDiscoverySession, type DiscoverySession } from '../session/index.js'
import { createLogger, type Logger } from '../logging/index.js'
import type { NsdConfig } from '../types/config.js'
import { output } from './output.js'

export interface CliRuntime {
  config: NsdConfig
  logger: Logger
  provider: BonjourProvider
  session: DiscoverySession
}

/**
 * Load configuration for a command. Prints the error and exits on
 * ConfigError; returns null in that case so callers can bail out.
 */
export function loadCliConfig(configPath: string | undefined): NsdConfig | null {
  try {
    return loadConfig(configPath)
  } catch (err) {
    if (err instanceof ConfigError) {
      output.error(err.message)
      process.exit(1)
      return null
    }
    throw err
  }
}

/** Wire a bonjour-backed session from configuration. */
export function createRuntime(config: NsdConfig): CliRuntime {
  const logger = createLogger(config.logging.level)
  const provider = new BonjourProvider({
    resolveTimeoutMs: config.bonjour.resolveTimeoutMs,
    probe: config.bonjour.probe,
    logger,
  })
  const session = createDiscoverySession(provider, config, logger)
  return { config, logger, provider, session }
}
