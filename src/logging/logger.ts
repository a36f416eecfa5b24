/**
 * Plain line logger for session diagnostics.
 *
 * Writes through process.stderr.write so the CLI's stdout stays clean for
 * results. No colors, no timestamps.
 */

import type { LogLevel } from '../types/config.js'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  silent: 3,
}

export function createLogger(
  level: LogLevel = 'info',
  write: (line: string) => void = (line) => {
    process.stderr.write(line)
  },
): Logger {
  const threshold = LEVEL_ORDER[level]
  const emit = (at: LogLevel, line: string): void => {
    if (LEVEL_ORDER[at] >= threshold) write(line + '\n')
  }

  return {
    debug: (message) => emit('debug', 'Debug: ' + message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', 'Warning: ' + message),
  }
}

export const silentLogger: Logger = createLogger('silent')
