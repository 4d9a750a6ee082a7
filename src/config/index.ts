import os from 'os'
import Joi from 'joi'
import type { Credential } from '../types'

export const APP_VERSION = '1.0.0'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = typeof LOG_LEVELS[number]

export type NodeEnv = 'development' | 'production' | 'test'

export interface AppConfig {
  // Server
  host: string
  port: number
  nodeEnv: NodeEnv
  logLevel: LogLevel
  version: string

  // JWT + credentials
  auth: {
    secretKey: string
    issuer: string
    accessTokenTtlSeconds: number
    users: readonly Credential[]
  }

  // CORS
  cors: {
    origins: string[] | '*'
  }

  rateLimit: {
    windowMs: number
    maxRequests: number
  }

  jsonBodyLimit: string
  renderConcurrency: number
}

/**
 * Raised for any problem found while reading configuration. Startup treats
 * it as fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

interface EnvVars {
  SECRET_KEY: string
  AUTH_USERS?: string
  AUTH_USERNAME?: string
  AUTH_PASSWORD?: string
  ACCESS_TOKEN_EXPIRE_SECONDS: number
  TOKEN_ISSUER: string
  HOST: string
  PORT: number
  LOG_LEVEL: LogLevel
  NODE_ENV: NodeEnv
  CORS_ORIGINS: string
  RATE_LIMIT_WINDOW_MS: number
  RATE_LIMIT_MAX_REQUESTS: number
  JSON_BODY_LIMIT: string
  RENDER_CONCURRENCY: number
}

const envSchema = Joi.object<EnvVars>({
  SECRET_KEY: Joi.string().empty('').min(16).required(),
  AUTH_USERS: Joi.string().empty(''),
  AUTH_USERNAME: Joi.string().empty(''),
  AUTH_PASSWORD: Joi.string().empty(''),
  ACCESS_TOKEN_EXPIRE_SECONDS: Joi.number().empty('').integer().min(1).default(1800),
  TOKEN_ISSUER: Joi.string().empty('').default('qr-code-api'),
  HOST: Joi.string().empty('').default('0.0.0.0'),
  PORT: Joi.number().empty('').port().default(8000),
  LOG_LEVEL: Joi.string().empty('').lowercase().valid(...LOG_LEVELS).default('info'),
  NODE_ENV: Joi.string().empty('').valid('development', 'production', 'test').default('development'),
  CORS_ORIGINS: Joi.string().empty('').default('*'),
  RATE_LIMIT_WINDOW_MS: Joi.number().empty('').integer().min(1).default(900000), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: Joi.number().empty('').integer().min(1).default(1000),
  JSON_BODY_LIMIT: Joi.string().empty('').default('64kb'),
  RENDER_CONCURRENCY: Joi.number().empty('').integer().min(1).default(() => os.availableParallelism())
}).unknown(true)

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export function parseAuthUsers(raw: string): Credential[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError('AUTH_USERS must be valid JSON')
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError('AUTH_USERS must be a JSON object mapping username to password')
  }

  const users = Object.entries(parsed).map(([username, secret]) => {
    if (!username.trim()) {
      throw new ConfigError('AUTH_USERS contains an empty username')
    }
    if (typeof secret !== 'string' || !secret) {
      throw new ConfigError(`AUTH_USERS entry "${username}" must have a non-empty string password`)
    }
    return { username, secret }
  })

  if (users.length === 0) {
    throw new ConfigError('AUTH_USERS must contain at least one user')
  }

  return users
}

function resolveUsers(env: EnvVars): Credential[] {
  if (env.AUTH_USERS !== undefined) {
    return parseAuthUsers(env.AUTH_USERS)
  }

  if (env.AUTH_USERNAME !== undefined && env.AUTH_PASSWORD !== undefined) {
    return [{ username: env.AUTH_USERNAME, secret: env.AUTH_PASSWORD }]
  }

  if (env.AUTH_USERNAME !== undefined || env.AUTH_PASSWORD !== undefined) {
    throw new ConfigError('AUTH_USERNAME and AUTH_PASSWORD must be set together')
  }

  throw new ConfigError('No users configured: set AUTH_USERS or AUTH_USERNAME/AUTH_PASSWORD')
}

function parseOrigins(raw: string): string[] | '*' {
  const origins = raw.split(',').map(origin => origin.trim()).filter(Boolean)
  return origins.length === 0 || origins.includes('*') ? '*' : origins
}

/**
 * Reads and validates the environment once. Throws ConfigError describing
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { value, error } = envSchema.validate(env, { abortEarly: false, convert: true })

  if (error) {
    throw new ConfigError(`Invalid configuration: ${error.details.map(d => d.message).join(', ')}`)
  }

  const users = resolveUsers(value)

  return {
    host: value.HOST,
    port: value.PORT,
    nodeEnv: value.NODE_ENV,
    logLevel: value.LOG_LEVEL,
    version: APP_VERSION,
    auth: {
      secretKey: value.SECRET_KEY,
      issuer: value.TOKEN_ISSUER,
      accessTokenTtlSeconds: value.ACCESS_TOKEN_EXPIRE_SECONDS,
      users: Object.freeze(users)
    },
    cors: {
      origins: parseOrigins(value.CORS_ORIGINS)
    },
    rateLimit: {
      windowMs: value.RATE_LIMIT_WINDOW_MS,
      maxRequests: value.RATE_LIMIT_MAX_REQUESTS
    },
    jsonBodyLimit: value.JSON_BODY_LIMIT,
    renderConcurrency: value.RENDER_CONCURRENCY
  }
}
