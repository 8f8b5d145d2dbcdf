import { describe, it, expect } from 'vitest'
import { loadConfig } from '../../src/config'

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({})

    expect(config).toMatchObject({
      env: 'development',
      port: 8000,
      host: '0.0.0.0',
      logging: { level: 'info', format: 'json' },
      cors: { origin: '*', credentials: false }
    })
    expect(config.staticDir).toMatch(/static$/)
  })

  it('should coerce values from environment strings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      LOG_FORMAT: 'text',
      CORS_CREDENTIALS: 'true',
      STATIC_DIR: '/srv/static'
    })

    expect(config.env).toBe('production')
    expect(config.port).toBe(3000)
    expect(config.logging.format).toBe('text')
    expect(config.cors.credentials).toBe(true)
    expect(config.staticDir).toBe('/srv/static')
  })

  it('should reject malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow()
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow()
    expect(() => loadConfig({ CORS_CREDENTIALS: 'yes' })).toThrow()
  })
})
