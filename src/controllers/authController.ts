import type { Response } from 'express'
import { asyncHandler, AuthenticationError } from '../middleware/errorHandler'
import type { TokenService } from '../services/tokenService'
import { logger } from '../utils/logger'
import type {
  AuthenticatedRequest,
  TokenRequest,
  TokenResponse,
  ValidateTokenResponse
} from '../types'

export const createAuthController = (tokens: TokenService) => {
  /**
   * @desc    Exchange username/password for an access token
   * @route   POST /v1/auth/token
   * @access  Public
   */
  const issueToken = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const { username, password }: TokenRequest = req.body

    const issued = await tokens.issue(username, password)
    logger.info(`Issued access token for ${username}`)

    const response: TokenResponse = {
      access_token: issued.accessToken,
      token_type: issued.tokenType,
      expires_in: issued.expiresIn
    }

    res.json(response)
  })

  /**
   * @desc    Report whether the presented bearer token is still valid
   * @route   POST /v1/auth/validate
   * @access  Private
   */
  const validateToken = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    if (!req.subject) {
      throw new AuthenticationError()
    }

    const response: ValidateTokenResponse = {
      valid: true,
      subject: req.subject.username,
      expires_at: req.subject.expiresAt
    }

    res.json(response)
  })

  return { issueToken, validateToken }
}
