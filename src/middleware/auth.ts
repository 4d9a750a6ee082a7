import type { Response, NextFunction, RequestHandler } from 'express'
import type { AuthenticatedRequest, Result, Subject } from '../types'
import { AuthenticationError, AuthorizationError } from './errorHandler'
import type { TokenService } from '../services/tokenService'

const BEARER = /^Bearer\s+(\S+)\s*$/i

/**
 * Checks an Authorization header value against the token service. Missing
 * or non-Bearer headers fail as `unauthorized`; token problems carry the
 * token service's own error.
 */
export const checkBearer = (
  authorization: string | undefined,
  tokens: TokenService
): Result<Subject, AuthenticationError> => {
  if (!authorization) {
    return { ok: false, error: new AuthenticationError('Missing authentication token') }
  }

  const match = BEARER.exec(authorization)
  if (!match || !match[1]) {
    return {
      ok: false,
      error: new AuthenticationError("Invalid authentication token format. Expected: 'Bearer <token>'")
    }
  }

  try {
    return { ok: true, value: tokens.verify(match[1]) }
  } catch (error) {
    if (error instanceof AuthenticationError) {
      return { ok: false, error }
    }
    throw error
  }
}

export const authenticateToken = (tokens: TokenService): RequestHandler => {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const result = checkBearer(req.headers.authorization, tokens)

    if (!result.ok) {
      next(result.error)
      return
    }

    req.subject = result.value
    next()
  }
}

export const requireScope = (scope: string): RequestHandler => {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.subject) {
      next(new AuthenticationError())
      return
    }

    if (!req.subject.scopes.includes(scope)) {
      next(new AuthorizationError(`Token lacks the ${scope} scope`))
      return
    }

    next()
  }
}
