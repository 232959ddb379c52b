/**
 * Tests for configuration loading and validation
 */

import { loadConfig, validateConfig, DEFAULT_ADMIN_TOKEN, DEFAULT_HOST, DEFAULT_PORT } from '../src/config'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      host: DEFAULT_HOST,
      port: DEFAULT_PORT,
      adminToken: DEFAULT_ADMIN_TOKEN,
    })
    expect(DEFAULT_PORT).toBe(21115)
  })

  it('reads the environment', () => {
    const config = loadConfig({}, {
      MOCK_HOST: '127.0.0.1',
      MOCK_PORT: '8080',
      MOCK_ADMIN_TOKEN: 'env-token',
    })

    expect(config).toEqual({ host: '127.0.0.1', port: 8080, adminToken: 'env-token' })
  })

  it('lets command line values win over the environment', () => {
    const config = loadConfig(
      { host: 'localhost', port: '9000', adminToken: 'flag-token' },
      { MOCK_HOST: '127.0.0.1', MOCK_PORT: '8080', MOCK_ADMIN_TOKEN: 'env-token' }
    )

    expect(config).toEqual({ host: 'localhost', port: 9000, adminToken: 'flag-token' })
  })
})

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(loadConfig({}, {}))).toEqual({ valid: true, errors: [] })
  })

  it('reports every invalid setting', () => {
    const result = validateConfig({ host: '', port: Number('abc'), adminToken: '' })

    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([
      'Host must not be empty (--host or MOCK_HOST)',
      'Port must be an integer between 0 and 65535 (--port or MOCK_PORT)',
      'Admin token must not be empty (--admin-token or MOCK_ADMIN_TOKEN)',
    ])
  })

  it('rejects ports out of range', () => {
    expect(validateConfig({ host: '0.0.0.0', port: 70000, adminToken: 'x' }).valid).toBe(false)
  })
})
