import { loadConfig, type AppConfig } from '../config'

export const TEST_SECRET = 'test-secret-key-for-unit-tests'
export const TEST_USERS = {
  admin: 'secure_password_123',
  viewer: 'viewer-password'
}

export const testEnv = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
  SECRET_KEY: TEST_SECRET,
  AUTH_USERS: JSON.stringify(TEST_USERS),
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  RENDER_CONCURRENCY: '2',
  ...overrides
})

export const testConfig = (overrides: NodeJS.ProcessEnv = {}): AppConfig => loadConfig(testEnv(overrides))
