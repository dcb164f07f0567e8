import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config'

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      DB_POOL_MAX: 10,
      OVERRIDE_AUTO_CLOSE_DAYS: 7,
    })
  })

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', OVERRIDE_AUTO_CLOSE_DAYS: '0' })
    expect(config.PORT).toBe(8080)
    expect(config.OVERRIDE_AUTO_CLOSE_DAYS).toBe(0)
  })

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration:\n {2}PORT: /)
  })

  it('rejects a malformed DATABASE_URL', () => {
    expect(() => loadConfig({ DATABASE_URL: 'not a url' })).toThrow(/DATABASE_URL: Invalid url/)
  })
})
