import { describe, expect, it } from 'vitest'
import jwt from 'jsonwebtoken'
import bcrypt from 'bcryptjs'
import { CredentialStore } from './credentialStore'
import { TokenService, isBcryptHash } from './tokenService'
import {
  InvalidCredentialsError,
  TokenExpiredError,
  TokenMalformedError
} from '../middleware/errorHandler'

const SECRET = 'test-secret-key-for-unit-tests'
const ISSUER = 'qr-code-api'
const T0 = 1_700_000_000_000

const store = new CredentialStore([
  { username: 'admin', secret: 'secure_password_123' },
  { username: 'viewer', secret: 'viewer-password' }
])

const createService = (options: { secretKey?: string; issuer?: string; clock?: () => number } = {}) =>
  new TokenService(store, {
    secretKey: options.secretKey ?? SECRET,
    issuer: options.issuer ?? ISSUER,
    ttlSeconds: 1800,
    clock: options.clock
  })

const base64url = (value: string): string => Buffer.from(value, 'utf8').toString('base64url')

describe('TokenService.issue', () => {
  it('issues a bearer token for valid credentials', async () => {
    const issued = await createService().issue('admin', 'secure_password_123')

    expect(issued.tokenType).toBe('bearer')
    expect(issued.expiresIn).toBe(1800)
    expect(issued.accessToken.split('.')).toHaveLength(3)
  })

  it('signs HS256 with subject, issuer, scopes and TTL', async () => {
    const service = createService({ clock: () => T0 })
    const { accessToken } = await service.issue('viewer', 'viewer-password')

    const decoded = jwt.decode(accessToken, { complete: true })

    expect(decoded?.header.alg).toBe('HS256')
    expect(decoded?.payload).toEqual({
      sub: 'viewer',
      iss: ISSUER,
      iat: T0 / 1000,
      exp: T0 / 1000 + 1800,
      scopes: ['qr:generate']
    })
  })

  it('rejects a wrong password', async () => {
    await expect(createService().issue('admin', 'wrong')).rejects.toBeInstanceOf(InvalidCredentialsError)
  })

  it('gives unknown users the same error as wrong passwords', async () => {
    const service = createService()

    const unknown = await service.issue('nobody', 'secure_password_123').catch((error: unknown) => error)
    const mismatch = await service.issue('admin', 'nope').catch((error: unknown) => error)

    expect(unknown).toBeInstanceOf(InvalidCredentialsError)
    expect(mismatch).toBeInstanceOf(InvalidCredentialsError)
    expect(unknown).toMatchObject({ message: 'Invalid username or password', code: 'invalid_credentials', statusCode: 401 })
    expect(mismatch).toMatchObject({ message: 'Invalid username or password', code: 'invalid_credentials', statusCode: 401 })
  })

  it('compares passwords exactly', async () => {
    const service = createService()

    await expect(service.issue('admin', 'secure_password_1234')).rejects.toBeInstanceOf(InvalidCredentialsError)
    await expect(service.issue('admin', 'SECURE_PASSWORD_123')).rejects.toBeInstanceOf(InvalidCredentialsError)
    await expect(service.issue('admin', '')).rejects.toBeInstanceOf(InvalidCredentialsError)
  })

  it('accepts bcrypt-hashed secrets', async () => {
    const hashed = new CredentialStore([{ username: 'ops', secret: bcrypt.hashSync('ops-password', 4) }])
    const service = new TokenService(hashed, { secretKey: SECRET, issuer: ISSUER, ttlSeconds: 60 })

    const issued = await service.issue('ops', 'ops-password')

    expect(service.verify(issued.accessToken).username).toBe('ops')
    await expect(service.issue('ops', 'wrong')).rejects.toBeInstanceOf(InvalidCredentialsError)
    await expect(service.issue('ghost', 'ops-password')).rejects.toBeInstanceOf(InvalidCredentialsError)
  })
})

describe('TokenService.verify', () => {
  it('returns the subject before the TTL elapses', async () => {
    let now = T0
    const service = createService({ clock: () => now })
    const { accessToken } = await service.issue('admin', 'secure_password_123')

    now = T0 + 1799 * 1000

    expect(service.verify(accessToken)).toEqual({
      username: 'admin',
      issuedAt: T0 / 1000,
      expiresAt: T0 / 1000 + 1800,
      scopes: ['qr:generate']
    })
  })

  it('reports TokenExpired once the TTL has elapsed', async () => {
    let now = T0
    const service = createService({ clock: () => now })
    const { accessToken } = await service.issue('admin', 'secure_password_123')

    now = T0 + 1801 * 1000

    expect(() => service.verify(accessToken)).toThrow(TokenExpiredError)
  })

  it('rejects tokens signed with another key', async () => {
    const foreign = await createService({ secretKey: 'another-secret-key-entirely' }).issue('admin', 'secure_password_123')

    expect(() => createService().verify(foreign.accessToken)).toThrow(TokenMalformedError)
  })

  it('rejects a tampered payload', async () => {
    const service = createService()
    const { accessToken } = await service.issue('viewer', 'viewer-password')
    const [header, payload, signature] = accessToken.split('.')

    const claims = JSON.parse(Buffer.from(payload ?? '', 'base64url').toString('utf8'))
    const forged = [header, base64url(JSON.stringify({ ...claims, sub: 'admin' })), signature].join('.')

    expect(() => service.verify(forged)).toThrow(TokenMalformedError)
  })

  it('rejects structurally invalid tokens', () => {
    const service = createService()

    expect(() => service.verify('invalid-token')).toThrow(TokenMalformedError)
    expect(() => service.verify('')).toThrow(TokenMalformedError)
    expect(() => service.verify('a.b.c')).toThrow(TokenMalformedError)
  })

  it('rejects a token from another issuer', async () => {
    const other = await createService({ issuer: 'someone-else' }).issue('admin', 'secure_password_123')

    expect(() => createService().verify(other.accessToken)).toThrow(TokenMalformedError)
  })

  it('rejects algorithms other than HS256', () => {
    const token = jwt.sign({ scopes: ['qr:generate'] }, SECRET, {
      algorithm: 'HS512',
      subject: 'admin',
      issuer: ISSUER,
      expiresIn: 60
    })

    expect(() => createService().verify(token)).toThrow(TokenMalformedError)
  })

  it('rejects tokens without a subject', () => {
    const token = jwt.sign({ scopes: ['qr:generate'] }, SECRET, { issuer: ISSUER, expiresIn: 60 })

    expect(() => createService().verify(token)).toThrow(TokenMalformedError)
  })

  it('drops non-string scopes', () => {
    const token = jwt.sign({ scopes: ['qr:generate', 7] }, SECRET, { subject: 'admin', issuer: ISSUER, expiresIn: 60 })

    expect(createService().verify(token).scopes).toEqual(['qr:generate'])
  })
})

describe('isBcryptHash', () => {
  it('recognises bcrypt prefixes only', () => {
    expect(isBcryptHash(bcrypt.hashSync('x', 4))).toBe(true)
    expect(isBcryptHash('$2y$10$abcdefghijklmnopqrstuv')).toBe(true)
    expect(isBcryptHash('secure_password_123')).toBe(false)
    expect(isBcryptHash('$1$md5crypt')).toBe(false)
  })
})
