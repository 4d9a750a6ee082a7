import { Router } from 'express'
import { validateBody, tokenRequestSchema } from '../middleware/validation'
import { authenticateToken } from '../middleware/auth'
import { createAuthController } from '../controllers/authController'
import type { TokenService } from '../services/tokenService'

export const createAuthRoutes = (tokens: TokenService): Router => {
  const router = Router()
  const { issueToken, validateToken } = createAuthController(tokens)

  /**
   * @route   POST /v1/auth/token
   * @desc    Issue an access token
   * @access  Public
   */
  router.post('/token', validateBody(tokenRequestSchema), issueToken)

  /**
   * @route   POST /v1/auth/validate
   * @desc    Check a bearer token
   * @access  Private
   */
  router.post('/validate', authenticateToken(tokens), validateToken)

  return router
}

export default createAuthRoutes
