import { describe, it, expect } from 'vitest'
import { ResumeDocumentInvalidError, ResumeRepository, RESUME_COLLECTION } from '../resume.repository'
import { submitResumeProfile } from '../resume.normalizer'
import { createTestStore } from '../../../../tests/helpers/test-store'

describe('ResumeRepository', () => {
  it('maps a stored document back to a typed record', () => {
    const store = createTestStore()
    const repo = new ResumeRepository(() => store)
    const createdAt = new Date('2026-02-01T00:00:00.000Z')

    repo.upsert(submitResumeProfile({ user_id: 'user-1', skills: ['Go'] }, () => null, createdAt))

    const record = repo.getByUserId('user-1')
    expect(record?.skills).toEqual(['Go'])
    expect(record?.created_at).toEqual(createdAt)
    expect(record).not.toHaveProperty('id')
  })

  it('returns null for a user without a resume', () => {
    const store = createTestStore()
    expect(new ResumeRepository(() => store).getByUserId('nobody')).toBeNull()
  })

  it('refuses documents that no longer match the resume shape', () => {
    const store = createTestStore()
    store.insertOne(RESUME_COLLECTION, { user_id: 'user-1', skills: 'not-a-list' })

    expect(() => new ResumeRepository(() => store).getByUserId('user-1')).toThrow(ResumeDocumentInvalidError)
  })

  it('reads created_at from documents that no longer match the resume shape', () => {
    const store = createTestStore()
    store.insertOne(RESUME_COLLECTION, { user_id: 'user-1', skills: 'not-a-list', created_at: '2025-06-01T00:00:00.000Z' })
    const repo = new ResumeRepository(() => store)

    expect(repo.findCreatedAt('user-1')).toEqual({ created_at: new Date('2025-06-01T00:00:00.000Z') })
    expect(repo.findCreatedAt('nobody')).toBeNull()
  })
})
