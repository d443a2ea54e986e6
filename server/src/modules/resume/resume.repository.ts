import { resumeProfilePayloadSchema, type ParsedResumeProfilePayload } from '@shared/types'
import type { DocumentBody, DocumentStoreProvider, StoredDocument } from '../../db/document-store'
import { getDocumentStore, requireStore } from '../../db/store'
import { parseTimestamp } from '../../utils/timestamps'
import type { ValidatedResumeProfile } from './resume.normalizer'

export const RESUME_COLLECTION = 'resume'

export class ResumeDocumentInvalidError extends Error {
  constructor(userId: string) {
    super(`Stored resume for ${userId} is malformed`)
    this.name = 'ResumeDocumentInvalidError'
  }
}

/** A resume document read back from the store, without its store id. */
export interface ResumeProfileRecord extends ParsedResumeProfilePayload {
  created_at: Date | null
  updated_at: Date | null
}

export function toResumeDocument(profile: ValidatedResumeProfile): DocumentBody {
  return {
    user_id: profile.user_id,
    email: profile.email,
    linkedin: profile.linkedin,
    twitter: profile.twitter,
    summary: profile.summary,
    skills: [...profile.skills],
    experiences: profile.experiences.map((entry) => ({ ...entry })),
    education: profile.education.map((entry) => ({ ...entry })),
    projects: profile.projects.map((entry) => ({ ...entry })),
    created_at: profile.created_at.toISOString(),
    updated_at: profile.updated_at.toISOString()
  }
}

export function fromResumeDocument(document: StoredDocument): ResumeProfileRecord {
  const parsed = resumeProfilePayloadSchema.safeParse(document.body)
  if (!parsed.success) {
    const userId = typeof document.body.user_id === 'string' ? document.body.user_id : document.id
    throw new ResumeDocumentInvalidError(userId)
  }
  return {
    ...parsed.data,
    created_at: parseTimestamp(document.body.created_at),
    updated_at: parseTimestamp(document.body.updated_at)
  }
}

export class ResumeRepository {
  constructor(private readonly storeProvider: DocumentStoreProvider = getDocumentStore) {}

  /** Full-document replace keyed by user_id, inserting when absent. */
  upsert(profile: ValidatedResumeProfile): void {
    const store = requireStore(this.storeProvider)
    store.replaceOne(RESUME_COLLECTION, { user_id: profile.user_id }, toResumeDocument(profile), { upsert: true })
  }

  /**
   * created_at of the stored resume, read without validating the rest of the
   * document, so a write can replace a resume saved under an older shape.
   */
  findCreatedAt(userId: string): { created_at: Date | null } | null {
    const store = requireStore(this.storeProvider)
    const document = store.findOne(RESUME_COLLECTION, { user_id: userId })
    return document ? { created_at: parseTimestamp(document.body.created_at) } : null
  }

  getByUserId(userId: string): ResumeProfileRecord | null {
    const store = requireStore(this.storeProvider)
    const document = store.findOne(RESUME_COLLECTION, { user_id: userId })
    return document ? fromResumeDocument(document) : null
  }
}
