import express, { type Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import morgan from 'morgan'
import rateLimit from 'express-rate-limit'
import responseTime from 'response-time'
import type { AppConfig } from './config'
import { errorHandler, notFound, RateLimitError } from './middleware/errorHandler'
import { CredentialStore } from './services/credentialStore'
import { TokenService } from './services/tokenService'
import type { QrRenderer } from './services/qrRenderer'
import { RenderPool } from './services/renderPool'
import type { HealthResponse } from './types'

// Import routes
import { createAuthRoutes } from './routes/auth'
import { createQrRoutes } from './routes/qr'

export interface AppDependencies {
  config: AppConfig
  tokens: TokenService
  renderer: QrRenderer
  pool?: RenderPool
}

/**
 * Builds the credential store and token service a config describes.
 */
export const createTokenService = (config: AppConfig, clock?: () => number): TokenService => {
  const credentials = new CredentialStore(config.auth.users)
  return new TokenService(credentials, {
    secretKey: config.auth.secretKey,
    issuer: config.auth.issuer,
    ttlSeconds: config.auth.accessTokenTtlSeconds,
    clock
  })
}

export const createApp = ({
  config,
  tokens,
  renderer,
  pool = new RenderPool(config.renderConcurrency)
}: AppDependencies): Express => {
  const app = express()

  // Wall time of every request, errors included
  app.use(responseTime({ header: 'X-Process-Time-Ms', digits: 2, suffix: false }))

  // Security middleware
  app.use(helmet())

  app.use(cors({
    origin: config.cors.origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    exposedHeaders: ['X-Process-Time-Ms', 'X-Generation-Time-Ms', 'X-QR-Size', 'X-Error-Correction', 'X-Output-Format']
  }))

  // Body parsing middleware
  app.use(express.json({ limit: config.jsonBodyLimit }))

  // Logging
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev'))
  }

  app.use('/v1', (req, res, next) => {
    res.header('X-API-Version', 'v1')
    next()
  })

  // Health check endpoint (no authentication, not rate limited)
  app.get('/v1/health', (req, res) => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.version
    }
    res.json(response)
  })

  app.use('/v1', rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, next) => next(new RateLimitError())
  }))

  // API Routes
  app.use('/v1/auth', createAuthRoutes(tokens))
  app.use('/v1/qr-code', createQrRoutes(tokens, renderer, pool))

  app.use(notFound)
  app.use(errorHandler)

  return app
}

export default createApp
