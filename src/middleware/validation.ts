import type { Request, Response, NextFunction, RequestHandler } from 'express'
import Joi from 'joi'
import {
  ERROR_CORRECTION_LEVELS,
  OUTPUT_ENCODINGS,
  OUTPUT_FORMATS,
  QR_SIZES,
  type ErrorCorrectionLevel,
  type OutputEncoding,
  type OutputFormat,
  type QrRequest,
  type QrSize
} from '../types'
import {
  CapacityExceededError,
  UnsupportedFormatError,
  ValidationError
} from './errorHandler'

export const MAX_DATA_LENGTH = 2000

// Conservative binary-mode ceilings (UTF-8 bytes) per error-correction level
export const CAPACITY_LIMITS: Record<ErrorCorrectionLevel, number> = {
  L: 1663,
  M: 1273,
  Q: 927,
  H: 713
}

// ftp:// data goes through the URL check, which only accepts http(s)
const URL_SCHEME = /^(?:https?|ftp):\/\//i
const URL_FORMAT = new RegExp(
  '^https?://' +
    '(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\\.)+[A-Z]{2,6}\\.?' + // domain
    '|localhost' +
    '|\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3})' + // or ipv4
    '(?::\\d+)?' + // port
    '(?:/?|[/?]\\S+)$',
  'i'
)

export const isValidUrl = (value: string): boolean => URL_FORMAT.test(value)

// Unpaired UTF-16 surrogates have no UTF-8 encoding
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/

export const isEncodable = (value: string): boolean => !LONE_SURROGATE.test(value)

// Joi error type -> constraint name reported to clients
const CONSTRAINTS: Record<string, string> = {
  'any.required': 'required',
  'object.base': 'type',
  'string.base': 'type',
  'string.empty': 'min_length',
  'string.min': 'min_length',
  'string.max': 'max_length',
  'string.pattern.name': 'not_blank',
  'string.uri': 'url_format',
  'string.encoding': 'encoding',
  'any.only': 'enum'
}

interface QrBody {
  data: string
  size: QrSize
  format: OutputFormat
  error_correction: ErrorCorrectionLevel
  output_format: OutputEncoding
}

// Key order is check order: Joi walks keys as declared and stops at the first failure
export const qrRequestSchema = Joi.object<QrBody>({
  data: Joi.string()
    .required()
    .min(1)
    .max(MAX_DATA_LENGTH)
    .pattern(/\S/, 'not_blank')
    .custom((value: string, helpers) =>
      URL_SCHEME.test(value) && !isValidUrl(value) ? helpers.error('string.uri') : value
    )
    .custom((value: string, helpers) => (isEncodable(value) ? value : helpers.error('string.encoding')))
    .messages({ 'string.encoding': 'Data contains invalid characters' }),
  size: Joi.string().valid(...QR_SIZES).default('medium'),
  format: Joi.string().valid(...OUTPUT_FORMATS).default('png'),
  error_correction: Joi.string().valid(...ERROR_CORRECTION_LEVELS).default('M'),
  output_format: Joi.string().valid(...OUTPUT_ENCODINGS).default('binary')
})
  .required()
  .unknown(true)

export const tokenRequestSchema = Joi.object({
  username: Joi.string().required(),
  password: Joi.string().required()
})
  .required()
  .unknown(true)

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: true,
  errors: { wrap: { label: false } }
}

const toValidationError = (error: Joi.ValidationError): ValidationError => {
  const [detail] = error.details
  if (!detail) {
    return new ValidationError(error.message, { field: 'body', constraint: 'invalid' })
  }

  const field = detail.path.length > 0 ? detail.path.join('.') : 'body'
  const constraint = CONSTRAINTS[detail.type] ?? 'invalid'

  if (field === 'format' && constraint === 'enum') {
    return new UnsupportedFormatError(detail.message, { field, constraint })
  }

  return new ValidationError(detail.message, { field, constraint })
}

export const checkCapacity = (data: string, level: ErrorCorrectionLevel): void => {
  const size = Buffer.byteLength(data, 'utf8')
  const limit = CAPACITY_LIMITS[level]

  if (size > limit) {
    throw new CapacityExceededError(
      `Data too large for error correction level ${level}. Maximum: ${limit} bytes, got: ${size}`,
      { field: 'data', constraint: 'capacity' }
    )
  }
}

/**
 * Parses a raw QR-generation body, applying defaults. Throws the error for
 * the first violated rule: data, size, format, error_correction,
 * output_format, then capacity.
 */
export const validateQrRequest = (raw: unknown): QrRequest => {
  const { value, error } = qrRequestSchema.validate(raw, VALIDATION_OPTIONS)

  if (error) {
    throw toValidationError(error)
  }

  checkCapacity(value.data, value.error_correction)

  return {
    data: value.data,
    size: value.size,
    format: value.format,
    errorCorrection: value.error_correction,
    outputEncoding: value.output_format
  }
}

export const validateBody = (schema: Joi.ObjectSchema): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { value, error } = schema.validate(req.body, VALIDATION_OPTIONS)

    if (error) {
      next(toValidationError(error))
      return
    }

    req.body = value
    next()
  }
}
