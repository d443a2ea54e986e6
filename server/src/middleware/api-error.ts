import type { Request, Response, NextFunction } from 'express'
import { ApiErrorCode, getApiErrorDefinition } from '@shared/types'
import { logger } from '../logger'
import { failure } from '../utils/api-response'

export class ApiHttpError extends Error {
  code: ApiErrorCode | string
  status: number
  details?: Record<string, unknown>

  constructor(
    code: ApiErrorCode | string,
    message?: string,
    options?: {
      status?: number
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    const definition = getApiErrorDefinition(code)
    // Preserve original error stack if provided
    super(message ?? definition.defaultMessage, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'ApiHttpError'
    this.code = code
    this.status = options?.status ?? definition.httpStatus
    this.details = options?.details
  }
}

interface NormalizedError {
  code: ApiErrorCode | string
  message: string
  status: number
  details?: Record<string, unknown>
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const normalizeError = (err: unknown): NormalizedError => {
  if (err instanceof ApiHttpError) {
    return {
      code: err.code,
      message: err.message,
      status: err.status,
      details: err.details
    }
  }

  if (isRecord(err)) {
    const maybeCode = typeof err.code === 'string' ? err.code : undefined
    const maybeStatus = typeof err.status === 'number' ? err.status : undefined
    // express.json() reports malformed bodies as status 400 with type entity.parse.failed
    const code = maybeCode ?? (maybeStatus !== undefined && maybeStatus < 500 ? ApiErrorCode.INVALID_REQUEST : undefined)
    const definition = getApiErrorDefinition(code ?? ApiErrorCode.INTERNAL_ERROR)

    return {
      code: code && definition.code === code ? code : definition.code,
      message: typeof err.message === 'string' ? err.message : definition.defaultMessage,
      status: maybeStatus ?? definition.httpStatus,
      details: isRecord(err.details) ? err.details : undefined
    }
  }

  const definition = getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR)
  return {
    code: ApiErrorCode.INTERNAL_ERROR,
    message: definition.defaultMessage,
    status: definition.httpStatus
  }
}

export const apiErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const normalized = normalizeError(err)
  const status = normalized.status

  const response = failure(normalized.code, normalized.message, normalized.details)

  if (process.env.NODE_ENV !== 'production' && err instanceof Error && err.stack) {
    response.error.stack = err.stack
  }

  const logLevel = status >= 500 ? 'error' : 'warn'
  logger[logLevel]({ err, code: normalized.code, status, path: req.path }, 'API error response')

  if (res.headersSent) return
  res.status(status).json(response)
}
