import { describe, it, expect } from 'vitest'
import { loadConfig, FMP_BASE_URL } from './config.js'
import { ConfigError } from './errors.js'

describe('loadConfig', () => {
  it('fills in defaults around the API key', () => {
    expect(loadConfig({ API_KEY: 'test-key' })).toEqual({
      fmp: { baseUrl: FMP_BASE_URL, apiKey: 'test-key', symbol: 'AAPL', period: 'annual' },
      web: { host: '0.0.0.0', port: 5000 },
    })
  })

  it('coerces PORT and reads HOST', () => {
    const config = loadConfig({ API_KEY: 'test-key', PORT: '8080', HOST: '127.0.0.1' })
    expect(config.web).toEqual({ host: '127.0.0.1', port: 8080 })
  })

  it('requires API_KEY', () => {
    expect(() => loadConfig({})).toThrow(ConfigError)
    expect(() => loadConfig({ API_KEY: '   ' })).toThrow('config: invalid environment (API_KEY: API_KEY is required)')
  })

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ API_KEY: 'test-key', PORT: 'http' })).toThrow(/PORT/)
  })

  it('returns a frozen config', () => {
    const config = loadConfig({ API_KEY: 'test-key' })
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.fmp)).toBe(true)
  })
})
