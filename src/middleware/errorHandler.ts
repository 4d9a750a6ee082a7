import type { Request, Response, NextFunction, RequestHandler } from 'express'
import type { AuthenticatedRequest, ErrorDetails, ErrorResponse } from '../types'
import { logger } from '../utils/logger'

const GENERIC_SERVER_MESSAGE = 'An unexpected error occurred while processing your request'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: ErrorDetails, statusCode = 400, code = 'validation_error') {
    super(statusCode, code, message, details)
    this.name = 'ValidationError'
  }
}

export class CapacityExceededError extends ValidationError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details, 400, 'capacity_exceeded')
    this.name = 'CapacityExceededError'
  }
}

export class UnsupportedFormatError extends ValidationError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details, 415, 'unsupported_format')
    this.name = 'UnsupportedFormatError'
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string = 'Authentication required', code = 'unauthorized') {
    super(401, code, message)
    this.name = 'AuthenticationError'
  }
}

// Same message for unknown user and wrong password
export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid username or password', 'invalid_credentials')
    this.name = 'InvalidCredentialsError'
  }
}

export class TokenExpiredError extends AuthenticationError {
  constructor(message: string = 'Token has expired') {
    super(message, 'token_expired')
    this.name = 'TokenExpiredError'
  }
}

export class TokenMalformedError extends AuthenticationError {
  constructor(message: string = 'Invalid authentication token') {
    super(message, 'token_malformed')
    this.name = 'TokenMalformedError'
  }
}

export class AuthorizationError extends ApiError {
  constructor(message: string = 'Insufficient permissions') {
    super(403, 'forbidden', message)
    this.name = 'AuthorizationError'
  }
}

export class PayloadTooLargeError extends ApiError {
  constructor(message: string = 'Request body is too large') {
    super(413, 'payload_too_large', message)
    this.name = 'PayloadTooLargeError'
  }
}

/**
 * Failure reported by the QR rendering collaborator. Caller-caused failures
 * (input the library refuses) surface as 422, anything else as 500.
 */
export class RenderFailureError extends ApiError {
  constructor(message: string, public callerCaused: boolean, options?: { cause?: unknown }) {
    super(
      callerCaused ? 422 : 500,
      callerCaused ? 'render_failed' : 'internal_error',
      message
    )
    this.name = 'RenderFailureError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string = 'Resource not found') {
    super(404, 'not_found', message)
    this.name = 'NotFoundError'
  }
}

export class RateLimitError extends ApiError {
  constructor(message: string = 'Too many requests, please try again later') {
    super(429, 'rate_limited', message)
    this.name = 'RateLimitError'
  }
}

export class InternalServerError extends ApiError {
  constructor(message: string = GENERIC_SERVER_MESSAGE) {
    super(500, 'internal_error', message)
    this.name = 'InternalServerError'
  }
}

// body-parser reports failures as http-errors carrying a `type`
const isBodyParserError = (err: unknown): err is Error & { type: string } =>
  err instanceof Error && 'type' in err && typeof err.type === 'string'

export const toApiError = (err: unknown): ApiError => {
  if (err instanceof ApiError) {
    return err
  }

  if (isBodyParserError(err)) {
    switch (err.type) {
      case 'entity.too.large':
        return new PayloadTooLargeError()
      case 'entity.parse.failed':
        return new ValidationError('Request body is not valid JSON', { field: 'body', constraint: 'json' })
      case 'encoding.unsupported':
      case 'charset.unsupported':
        return new ValidationError('Unsupported request body encoding', { field: 'body', constraint: 'encoding' }, 415, 'unsupported_format')
    }
  }

  return new InternalServerError()
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its arity
  next: NextFunction
): void => {
  const apiError = toApiError(err)
  const { statusCode } = apiError

  if (statusCode >= 500) {
    logger.error('Server Error', {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
      url: req.originalUrl,
      method: req.method
    })
  } else {
    logger.warn(`${req.method} ${req.originalUrl} -> ${statusCode} ${apiError.code}: ${apiError.message}`)
  }

  if (statusCode === 401) {
    res.setHeader('WWW-Authenticate', 'Bearer')
  }

  // 5xx never carries the underlying message
  const response: ErrorResponse = {
    error: apiError.code,
    message: statusCode >= 500 ? GENERIC_SERVER_MESSAGE : apiError.message
  }

  if (apiError.details) {
    response.details = apiError.details
  }

  res.status(statusCode).json(response)
}

export const asyncHandler = (
  fn: (req: AuthenticatedRequest, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next)
  }
}

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.originalUrl} not found`))
}
