import { ApiErrorCode, getApiErrorDefinition, type ValidationIssue } from '@shared/types'
import type { ZodError } from 'zod'

/**
 * Base for the domain failures the API reports. apiErrorHandler reads code,
 * status and details straight off the instance.
 */
export abstract class DomainError extends Error {
  abstract readonly code: ApiErrorCode
  readonly status: number
  readonly details?: Record<string, unknown>

  protected constructor(
    code: ApiErrorCode,
    message: string,
    options?: { status?: number; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.status = options?.status ?? getApiErrorDefinition(code).httpStatus
    this.details = options?.details
  }
}

export class ValidationError extends DomainError {
  readonly code = ApiErrorCode.VALIDATION_FAILED
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], message = 'Request validation failed') {
    super(ApiErrorCode.VALIDATION_FAILED, message, { details: { issues } })
    this.name = 'ValidationError'
    this.issues = issues
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    )
  }
}

export class NotConfiguredError extends DomainError {
  readonly code = ApiErrorCode.NOT_CONFIGURED

  constructor(message: string, options?: { status?: number }) {
    super(ApiErrorCode.NOT_CONFIGURED, message, options)
    this.name = 'NotConfiguredError'
  }
}

export class StorageUnavailableError extends DomainError {
  readonly code = ApiErrorCode.STORAGE_UNAVAILABLE

  constructor(message = 'Document store unavailable', options?: { cause?: unknown }) {
    super(ApiErrorCode.STORAGE_UNAVAILABLE, message, options)
    this.name = 'StorageUnavailableError'
  }
}

export class UpstreamError extends DomainError {
  readonly code = ApiErrorCode.UPSTREAM_ERROR

  constructor(message: string, options?: { cause?: unknown }) {
    super(ApiErrorCode.UPSTREAM_ERROR, message, options)
    this.name = 'UpstreamError'
  }
}
