/**
 * API Types
 *
 * Error codes and response envelopes shared by the career coach API and its clients.
 */

/**
 * API Error Codes
 * Standardized error codes for consistent error handling across all API endpoints
 */
export enum ApiErrorCode {
  // Validation errors
  INVALID_REQUEST = "INVALID_REQUEST",
  VALIDATION_FAILED = "VALIDATION_FAILED",

  // Resource errors
  NOT_FOUND = "NOT_FOUND",

  // Configuration and dependency errors
  NOT_CONFIGURED = "NOT_CONFIGURED",
  STORAGE_UNAVAILABLE = "STORAGE_UNAVAILABLE",
  UPSTREAM_ERROR = "UPSTREAM_ERROR",

  // System errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Optional metadata describing an API error code.
 *
 * httpStatus: the HTTP status the backend should return for this code
 * defaultMessage: developer-facing default message
 * userMessage: safe user-facing copy for the UI (optional)
 * retryable: whether the client may retry automatically
 */
export interface ApiErrorDefinition {
  code: ApiErrorCode
  httpStatus: number
  defaultMessage: string
  userMessage?: string
  retryable?: boolean
}

export const API_ERROR_DEFINITIONS: Record<ApiErrorCode, ApiErrorDefinition> = {
  [ApiErrorCode.INVALID_REQUEST]: {
    code: ApiErrorCode.INVALID_REQUEST,
    httpStatus: 400,
    defaultMessage: "Invalid request",
    userMessage: "Something about that request wasn't right.",
    retryable: false
  },
  [ApiErrorCode.VALIDATION_FAILED]: {
    code: ApiErrorCode.VALIDATION_FAILED,
    httpStatus: 422,
    defaultMessage: "Validation failed",
    userMessage: "Some fields are missing or out of range.",
    retryable: false
  },
  [ApiErrorCode.NOT_FOUND]: {
    code: ApiErrorCode.NOT_FOUND,
    httpStatus: 404,
    defaultMessage: "Resource not found",
    userMessage: "We couldn't find what you were looking for.",
    retryable: false
  },
  [ApiErrorCode.NOT_CONFIGURED]: {
    code: ApiErrorCode.NOT_CONFIGURED,
    httpStatus: 500,
    defaultMessage: "Service not configured",
    userMessage: "This feature isn't set up on the server yet.",
    retryable: false
  },
  [ApiErrorCode.STORAGE_UNAVAILABLE]: {
    code: ApiErrorCode.STORAGE_UNAVAILABLE,
    httpStatus: 503,
    defaultMessage: "Storage unavailable",
    userMessage: "We couldn't reach our data store. Please try again.",
    retryable: true
  },
  [ApiErrorCode.UPSTREAM_ERROR]: {
    code: ApiErrorCode.UPSTREAM_ERROR,
    httpStatus: 502,
    defaultMessage: "Upstream provider returned an error",
    userMessage: "Our writing assistant ran into an issue. Please try again.",
    retryable: true
  },
  [ApiErrorCode.INTERNAL_ERROR]: {
    code: ApiErrorCode.INTERNAL_ERROR,
    httpStatus: 500,
    defaultMessage: "Unexpected internal error",
    userMessage: "Something went wrong on our side. Please try again.",
    retryable: true
  }
}

export const DEFAULT_API_ERROR_DEFINITION: ApiErrorDefinition = API_ERROR_DEFINITIONS[ApiErrorCode.INTERNAL_ERROR]

const isApiErrorCode = (code: string): code is ApiErrorCode =>
  Object.prototype.hasOwnProperty.call(API_ERROR_DEFINITIONS, code)

export const getApiErrorDefinition = (code?: ApiErrorCode | string | null): ApiErrorDefinition => {
  if (!code) return DEFAULT_API_ERROR_DEFINITION
  if (isApiErrorCode(code)) {
    return API_ERROR_DEFINITIONS[code]
  }
  return DEFAULT_API_ERROR_DEFINITION
}

/**
 * A single field-level validation problem.
 * path is the dotted location inside the payload, e.g. "experiences.0.company".
 */
export interface ValidationIssue {
  path: string
  message: string
}

/**
 * Generic API error response
 * Discriminated union type with success: false
 */
export interface ApiErrorResponse {
  success: false
  error: {
    code: ApiErrorCode | string
    message: string
    details?: Record<string, unknown>
    stack?: string // Only in development
  }
}

/**
 * Body returned by successful writes.
 */
export interface WriteAcknowledgement {
  ok: true
}

export interface CreateQuizResultResponse extends WriteAcknowledgement {
  id: string
}
