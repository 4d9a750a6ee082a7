import dotenv from 'dotenv'
import { loadConfig, type AppConfig } from './config'
import { createApp, createTokenService } from './app'
import { WorkerQrRenderer } from './services/workerRenderer'
import { logger, setLogLevel } from './utils/logger'

dotenv.config()

const start = (): void => {
  let config: AppConfig
  let tokens: ReturnType<typeof createTokenService>

  // Validate configuration
  try {
    config = loadConfig()
    tokens = createTokenService(config)
  } catch (error) {
    console.error('Configuration validation failed:', error instanceof Error ? error.message : error)
    process.exit(1)
  }

  setLogLevel(config.logLevel)

  const renderer = new WorkerQrRenderer(config.renderConcurrency)
  const app = createApp({ config, tokens, renderer })

  const server = app.listen(config.port, config.host, () => {
    logger.info(`🚀 QR Code API v${config.version} listening on http://${config.host}:${config.port}`)
    logger.info(`✅ ${config.auth.users.length} user(s) configured, token TTL ${config.auth.accessTokenTtlSeconds}s, render concurrency ${config.renderConcurrency}`)
  })

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, closing server`)
    server.close(error => {
      if (error) {
        logger.error('Error while closing server', { message: error.message })
      }
      renderer.close().then(
        () => process.exit(error ? 1 : 0),
        (closeError: unknown) => {
          logger.error('Error while stopping render workers', {
            message: closeError instanceof Error ? closeError.message : String(closeError)
          })
          process.exit(1)
        }
      )
    })
  }

  process.once('SIGTERM', shutdown)
  process.once('SIGINT', shutdown)
}

start()
