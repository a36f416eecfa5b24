import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig, ConfigError } from './loader.js'
import { DEFAULT_CONFIG } from './defaults.js'

describe('loadConfig', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'nsd-test-'))
    configPath = join(tempDir, 'nsd.config.json')
  })

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('NSD_')) {
        delete process.env[key]
      }
    }
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('successful loading', () => {
    it('should return defaults when no path is given', () => {
      const config = loadConfig()
      expect(config).toEqual(DEFAULT_CONFIG)
    })

    it('should apply defaults for missing fields', () => {
      writeFileSync(configPath, JSON.stringify({ service: { name: 'printer-queue' } }))
      const config = loadConfig(configPath)
      expect(config.service.name).toBe('printer-queue')
      expect(config.service.type).toBe('_nsd._tcp')
      expect(config.service.port).toBe(8080)
      expect(config.session.excludeOwnService).toBe(false)
      expect(config.session.notifications).toBe('queued')
      expect(config.discovery.timeoutMs).toBe(3000)
      expect(config.logging.level).toBe('info')
    })

    it('should override defaults with user-specified values', () => {
      writeFileSync(configPath, JSON.stringify({
        service: { type: '_ipp._tcp', port: 631, attributes: { rp: 'queue' } },
        session: { notifications: 'immediate' },
      }))
      const config = loadConfig(configPath)
      expect(config.service.type).toBe('_ipp._tcp')
      expect(config.service.port).toBe(631)
      expect(config.service.attributes).toEqual({ rp: 'queue' })
      expect(config.session.notifications).toBe('immediate')
    })

    it('should not mutate the shared defaults', () => {
      process.env.NSD_SERVICE__PORT = '9000'
      loadConfig()
      expect(DEFAULT_CONFIG.service.port).toBe(8080)
    })
  })

  describe('environment variable overrides', () => {
    it('should override nested config with double underscore (NSD_SERVICE__PORT)', () => {
      process.env.NSD_SERVICE__PORT = '9090'
      const config = loadConfig()
      expect(config.service.port).toBe(9090)
    })

    it('should coerce boolean env vars (NSD_SESSION__EXCLUDEOWNSERVICE=true)', () => {
      process.env.NSD_SESSION__EXCLUDEOWNSERVICE = 'true'
      const config = loadConfig()
      expect(config.session.excludeOwnService).toBe(true)
    })

    it('should keep string values as strings', () => {
      process.env.NSD_DISCOVERY__SERVICETYPE = '_http._tcp'
      const config = loadConfig()
      expect(config.discovery.serviceType).toBe('_http._tcp')
    })

    it('should take precedence over the config file', () => {
      writeFileSync(configPath, JSON.stringify({ logging: { level: 'warn' } }))
      process.env.NSD_LOGGING__LEVEL = 'debug'
      const config = loadConfig(configPath)
      expect(config.logging.level).toBe('debug')
    })
  })

  describe('error handling', () => {
    it('should throw ConfigError for missing config file', () => {
      expect(() => loadConfig('/tmp/nonexistent-nsd-config.json')).toThrow(ConfigError)
      expect(() => loadConfig('/tmp/nonexistent-nsd-config.json')).toThrow('Configuration file not found')
    })

    it('should throw ConfigError for invalid JSON', () => {
      writeFileSync(configPath, '{ invalid json }')
      expect(() => loadConfig(configPath)).toThrow(ConfigError)
      expect(() => loadConfig(configPath)).toThrow('Invalid JSON')
    })

    it('should throw ConfigError when the file is not an object', () => {
      writeFileSync(configPath, '[1, 2, 3]')
      expect(() => loadConfig(configPath)).toThrow('must contain a JSON object')
    })

    it('should throw ConfigError with field details for invalid values', () => {
      writeFileSync(configPath, JSON.stringify({ session: { notifications: 'loud' } }))
      try {
        loadConfig(configPath)
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        if (!(err instanceof ConfigError)) return
        expect(err.message).toContain('Configuration invalid')
        expect(err.fields.some((f) => f.path === '/session/notifications')).toBe(true)
      }
    })

    it('should reject an out-of-range port', () => {
      writeFileSync(configPath, JSON.stringify({ service: { port: 70000 } }))
      expect(() => loadConfig(configPath)).toThrow(ConfigError)
    })
  })

  describe('config immutability', () => {
    it('should deeply freeze the config', () => {
      const config = loadConfig()
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.session)).toBe(true)
      expect(Object.isFrozen(config.service.attributes)).toBe(true)
    })
  })
})
