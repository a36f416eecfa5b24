import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, silentLogger } from './logger.js'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes debug and warning lines', () => {
    const lines: string[] = []
    const logger = createLogger('debug', (line) => lines.push(line))

    logger.debug('Registered as "Foo"')
    logger.info('Scanning')
    logger.warn('resolve failed: Internal error.')

    expect(lines).toEqual([
      'Debug: Registered as "Foo"\n',
      'Scanning\n',
      'Warning: resolve failed: Internal error.\n',
    ])
  })

  it('drops lines below the configured level', () => {
    const lines: string[] = []
    const logger = createLogger('warn', (line) => lines.push(line))

    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')

    expect(lines).toEqual(['Warning: shown\n'])
  })

  it('writes to stderr by default', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

    createLogger().info('hello')

    expect(stderrSpy).toHaveBeenCalledWith('hello\n')
  })

  it('silentLogger writes nothing', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

    silentLogger.warn('nothing to see')

    expect(stderrSpy).not.toHaveBeenCalled()
  })
})
