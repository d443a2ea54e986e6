import type { ApiErrorResponse, ApiErrorCode } from '@shared/types'

export const failure = (
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse => ({
  success: false,
  error: {
    code,
    message,
    ...(details ? { details } : {})
  }
})
