import { quizResultPayloadSchema, type ParsedQuizResultPayload } from '@shared/types'
import { parseOrThrow } from '../../utils/validation'

export interface ValidatedQuizResult extends ParsedQuizResultPayload {
  created_at: Date
  updated_at: Date
}

/**
 * Validates a quiz submission and stamps both timestamps with the same instant.
 * Throws ValidationError before anything reaches the store.
 */
export function submitQuizResult(input: unknown, now: Date = new Date()): ValidatedQuizResult {
  const payload = parseOrThrow(quizResultPayloadSchema, input)
  return {
    ...payload,
    created_at: now,
    updated_at: now
  }
}
