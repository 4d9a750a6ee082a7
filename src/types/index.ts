// Base Types for the QR Code API
import type { Request } from 'express'

export const QR_SIZES = ['small', 'medium', 'large'] as const
export const OUTPUT_FORMATS = ['png', 'svg', 'jpeg', 'pdf'] as const
export const ERROR_CORRECTION_LEVELS = ['L', 'M', 'Q', 'H'] as const
export const OUTPUT_ENCODINGS = ['binary', 'base64'] as const

export type QrSize = typeof QR_SIZES[number]
export type OutputFormat = typeof OUTPUT_FORMATS[number]
export type ErrorCorrectionLevel = typeof ERROR_CORRECTION_LEVELS[number]
export type OutputEncoding = typeof OUTPUT_ENCODINGS[number]

export interface QrRequest {
  data: string
  size: QrSize
  format: OutputFormat
  errorCorrection: ErrorCorrectionLevel
  outputEncoding: OutputEncoding
}

export interface RenderedQr {
  body: Buffer
  contentType: string
}

export interface Credential {
  username: string
  secret: string // plaintext or bcrypt hash
}

export interface Subject {
  username: string
  issuedAt: number // epoch seconds
  expiresAt: number // epoch seconds
  scopes: string[]
}

export interface IssuedToken {
  accessToken: string
  tokenType: 'bearer'
  expiresIn: number
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// Request / Response types
export interface TokenRequest {
  username: string
  password: string
}

export interface TokenResponse {
  access_token: string
  token_type: 'bearer'
  expires_in: number
}

export interface ValidateTokenResponse {
  valid: true
  subject: string
  expires_at: number
}

export interface QrBase64Response {
  data: string
  format: OutputFormat
  encoding: 'base64'
  size: QrSize
  error_correction: ErrorCorrectionLevel
}

export interface HealthResponse {
  status: 'healthy'
  timestamp: string
  version: string
}

export interface ErrorDetails {
  field: string
  constraint: string
}

export interface ErrorResponse {
  error: string
  message: string
  details?: ErrorDetails
}

export interface AuthenticatedRequest extends Request {
  subject?: Subject
}
