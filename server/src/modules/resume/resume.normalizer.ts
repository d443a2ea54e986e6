import { resumeProfilePayloadSchema, type ParsedResumeProfilePayload } from '@shared/types'
import { parseOrThrow } from '../../utils/validation'

export interface ValidatedResumeProfile extends ParsedResumeProfilePayload {
  created_at: Date
  updated_at: Date
}

/** Looks up the creation instant of an existing profile, if there is one. */
export type ExistingProfileLookup = (userId: string) => { created_at: Date | null } | null

/**
 * Validates a resume write and stamps it. Omitted optional fields take their
 * defaults, so the result is a complete replacement document. created_at is
 * carried over from the existing profile; the lookup runs only after the
 * payload has validated.
 */
export function submitResumeProfile(
  input: unknown,
  lookupExisting: ExistingProfileLookup,
  now: Date = new Date()
): ValidatedResumeProfile {
  const payload = parseOrThrow(resumeProfilePayloadSchema, input)
  const existing = lookupExisting(payload.user_id)

  return {
    ...payload,
    created_at: existing?.created_at ?? now,
    updated_at: now
  }
}
