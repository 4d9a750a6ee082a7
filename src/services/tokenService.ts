import { createHash, randomBytes, timingSafeEqual } from 'crypto'
import jwt, { type JwtPayload } from 'jsonwebtoken'
import bcrypt from 'bcryptjs'
import type { IssuedToken, Subject } from '../types'
import {
  InvalidCredentialsError,
  TokenExpiredError,
  TokenMalformedError
} from '../middleware/errorHandler'
import type { CredentialStore } from './credentialStore'

export const TOKEN_ALGORITHM = 'HS256'
export const QR_SCOPE = 'qr:generate'
export const DEFAULT_SCOPES = [QR_SCOPE]

const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$/

export interface TokenServiceOptions {
  secretKey: string
  issuer: string
  ttlSeconds: number
  // epoch milliseconds
  clock?: () => number
}

export const isBcryptHash = (secret: string): boolean => BCRYPT_HASH.test(secret)

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest()

// Equal-length digests keep timingSafeEqual independent of input length
const plaintextMatches = (candidate: string, secret: string): boolean =>
  timingSafeEqual(digest(candidate), digest(secret))

const isString = (value: unknown): value is string => typeof value === 'string'

export class TokenService {
  private readonly clock: () => number
  private decoySecret?: string

  constructor(
    private readonly credentials: CredentialStore,
    private readonly options: TokenServiceOptions
  ) {
    this.clock = options.clock ?? Date.now
  }

  /**
   * Exchanges a username/password pair for a signed access token.
   * Unknown usernames still run a comparison so both failure paths cost
   * the same.
   */
  async issue(username: string, password: string): Promise<IssuedToken> {
    const credential = this.credentials.lookup(username)
    const secret = credential?.secret ?? this.getDecoySecret()
    const matches = await this.secretMatches(password, secret)

    if (!credential || !matches) {
      throw new InvalidCredentialsError()
    }

    const accessToken = jwt.sign(
      { scopes: DEFAULT_SCOPES, iat: this.nowSeconds() },
      this.options.secretKey,
      {
        algorithm: TOKEN_ALGORITHM,
        expiresIn: this.options.ttlSeconds,
        subject: credential.username,
        issuer: this.options.issuer
      }
    )

    return {
      accessToken,
      tokenType: 'bearer',
      expiresIn: this.options.ttlSeconds
    }
  }

  verify(token: string): Subject {
    let payload: string | JwtPayload

    try {
      payload = jwt.verify(token, this.options.secretKey, {
        algorithms: [TOKEN_ALGORITHM],
        issuer: this.options.issuer,
        clockTimestamp: this.nowSeconds()
      })
    } catch (error) {
      // TokenExpiredError is a JsonWebTokenError, so it goes first
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError()
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new TokenMalformedError()
      }
      throw error
    }

    if (
      typeof payload === 'string' ||
      typeof payload.sub !== 'string' ||
      typeof payload.iat !== 'number' ||
      typeof payload.exp !== 'number'
    ) {
      throw new TokenMalformedError()
    }

    const scopes: unknown = payload.scopes

    return {
      username: payload.sub,
      issuedAt: payload.iat,
      expiresAt: payload.exp,
      scopes: Array.isArray(scopes) ? scopes.filter(isString) : []
    }
  }

  private async secretMatches(candidate: string, secret: string): Promise<boolean> {
    if (isBcryptHash(secret)) {
      return bcrypt.compare(candidate, secret)
    }
    return plaintextMatches(candidate, secret)
  }

  // Matches the kind of secret the store holds so unknown users take as long as known ones
  private getDecoySecret(): string {
    if (this.decoySecret === undefined) {
      const hashed = this.credentials
        .usernames()
        .map(username => this.credentials.lookup(username)?.secret)
        .find((secret): secret is string => secret !== undefined && isBcryptHash(secret))

      const filler = randomBytes(16).toString('hex')
      this.decoySecret = hashed ? bcrypt.hashSync(filler, bcrypt.getRounds(hashed)) : filler
    }
    return this.decoySecret
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000)
  }
}
