import { describe, expect, it } from 'vitest'
import { ConfigError, loadConfig, parseAuthUsers } from './index'
import { testEnv, TEST_SECRET } from '../test-utils/config'

describe('loadConfig', () => {
  it('applies defaults around the required settings', () => {
    const config = loadConfig({
      SECRET_KEY: TEST_SECRET,
      AUTH_USERS: '{"admin":"secure_password_123"}'
    })

    expect(config.host).toBe('0.0.0.0')
    expect(config.port).toBe(8000)
    expect(config.nodeEnv).toBe('development')
    expect(config.logLevel).toBe('info')
    expect(config.version).toBe('1.0.0')
    expect(config.auth).toEqual({
      secretKey: TEST_SECRET,
      issuer: 'qr-code-api',
      accessTokenTtlSeconds: 1800,
      users: [{ username: 'admin', secret: 'secure_password_123' }]
    })
    expect(config.cors.origins).toBe('*')
    expect(config.rateLimit).toEqual({ windowMs: 900000, maxRequests: 1000 })
    expect(config.jsonBodyLimit).toBe('64kb')
    expect(config.renderConcurrency).toBeGreaterThanOrEqual(1)
  })

  it('reads numeric settings from strings', () => {
    const config = loadConfig(testEnv({
      PORT: '9090',
      ACCESS_TOKEN_EXPIRE_SECONDS: '600',
      RENDER_CONCURRENCY: '3'
    }))

    expect(config.port).toBe(9090)
    expect(config.auth.accessTokenTtlSeconds).toBe(600)
    expect(config.renderConcurrency).toBe(3)
  })

  it('treats empty variables as unset', () => {
    const config = loadConfig(testEnv({ TOKEN_ISSUER: '', PORT: '' }))

    expect(config.auth.issuer).toBe('qr-code-api')
    expect(config.port).toBe(8000)
  })

  it('splits CORS origins', () => {
    const config = loadConfig(testEnv({ CORS_ORIGINS: 'http://a.example, http://b.example' }))

    expect(config.cors.origins).toEqual(['http://a.example', 'http://b.example'])
  })

  it('fails without a secret key', () => {
    expect(() => loadConfig(testEnv({ SECRET_KEY: undefined }))).toThrow(ConfigError)
    expect(() => loadConfig(testEnv({ SECRET_KEY: undefined }))).toThrow(/SECRET_KEY/)
  })

  it('fails on a short secret key', () => {
    expect(() => loadConfig(testEnv({ SECRET_KEY: 'short' }))).toThrow(/SECRET_KEY/)
  })

  it('fails on an invalid port', () => {
    expect(() => loadConfig(testEnv({ PORT: 'eighty' }))).toThrow(/PORT/)
  })

  it('fails on an unknown log level', () => {
    expect(() => loadConfig(testEnv({ LOG_LEVEL: 'verbose' }))).toThrow(/LOG_LEVEL/)
  })

  it('falls back to a single AUTH_USERNAME/AUTH_PASSWORD user', () => {
    const config = loadConfig(testEnv({
      AUTH_USERS: undefined,
      AUTH_USERNAME: 'operator',
      AUTH_PASSWORD: 'operator-password'
    }))

    expect(config.auth.users).toEqual([{ username: 'operator', secret: 'operator-password' }])
  })

  it('requires AUTH_USERNAME and AUTH_PASSWORD together', () => {
    expect(() => loadConfig(testEnv({ AUTH_USERS: undefined, AUTH_USERNAME: 'operator' })))
      .toThrow('AUTH_USERNAME and AUTH_PASSWORD must be set together')
  })

  it('fails when no users are configured', () => {
    expect(() => loadConfig(testEnv({ AUTH_USERS: undefined })))
      .toThrow('No users configured: set AUTH_USERS or AUTH_USERNAME/AUTH_PASSWORD')
  })

  it('freezes the user list', () => {
    const config = loadConfig(testEnv())

    expect(Object.isFrozen(config.auth.users)).toBe(true)
  })
})

describe('parseAuthUsers', () => {
  it('maps each entry to a credential', () => {
    expect(parseAuthUsers('{"admin":"a-password","ops":"b-password"}')).toEqual([
      { username: 'admin', secret: 'a-password' },
      { username: 'ops', secret: 'b-password' }
    ])
  })

  it('rejects malformed JSON', () => {
    expect(() => parseAuthUsers('{admin:')).toThrow('AUTH_USERS must be valid JSON')
  })

  it('rejects JSON that is not an object', () => {
    expect(() => parseAuthUsers('["admin"]')).toThrow('AUTH_USERS must be a JSON object mapping username to password')
    expect(() => parseAuthUsers('null')).toThrow(ConfigError)
  })

  it('rejects non-string and empty passwords', () => {
    expect(() => parseAuthUsers('{"admin":42}')).toThrow('AUTH_USERS entry "admin" must have a non-empty string password')
    expect(() => parseAuthUsers('{"admin":""}')).toThrow(ConfigError)
  })

  it('rejects empty usernames and empty maps', () => {
    expect(() => parseAuthUsers('{" ":"pw"}')).toThrow('AUTH_USERS contains an empty username')
    expect(() => parseAuthUsers('{}')).toThrow('AUTH_USERS must contain at least one user')
  })
})
