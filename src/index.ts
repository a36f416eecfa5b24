export * from './types/index.js'
export * from './session/index.js'
export * from './bonjour/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export { createLogger, silentLogger } from './logging/index.js'
export type { Logger } from './logging/index.js'
