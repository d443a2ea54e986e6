import { describe, it, expect, vi } from 'vitest'
import { submitResumeProfile } from '../resume.normalizer'
import { ValidationError } from '../../../errors'

const now = new Date('2026-04-01T09:30:00.000Z')
const noExisting = () => null

function issuesFor(input: unknown) {
  try {
    submitResumeProfile(input, noExisting, now)
  } catch (error) {
    if (error instanceof ValidationError) return error.issues
    throw error
  }
  throw new Error('expected a ValidationError')
}

describe('submitResumeProfile', () => {
  it('fills every omitted field with its default', () => {
    expect(submitResumeProfile({ user_id: 'user-1' }, noExisting, now)).toEqual({
      user_id: 'user-1',
      email: null,
      linkedin: null,
      twitter: null,
      summary: null,
      skills: [],
      experiences: [],
      education: [],
      projects: [],
      created_at: now,
      updated_at: now
    })
  })

  it('normalizes optional sub-record fields to null', () => {
    const profile = submitResumeProfile(
      {
        user_id: 'user-1',
        experiences: [{ company: 'Acme', role: 'Analyst', start: '2021-01', end: '2023-06' }],
        education: [{ school: 'State U', degree: 'BSc', start: '2017', end: '2021' }],
        projects: [{ name: 'Dashboards' }]
      },
      noExisting,
      now
    )

    expect(profile.experiences).toEqual([
      { company: 'Acme', role: 'Analyst', start: '2021-01', end: '2023-06', description: null }
    ])
    expect(profile.education).toEqual([{ school: 'State U', degree: 'BSc', start: '2017', end: '2021', details: null }])
    expect(profile.projects).toEqual([{ name: 'Dashboards', link: null, description: null }])
  })

  it('keeps created_at from the existing profile', () => {
    const createdAt = new Date('2026-01-15T00:00:00.000Z')
    const profile = submitResumeProfile({ user_id: 'user-1' }, () => ({ created_at: createdAt }), now)

    expect(profile.created_at).toBe(createdAt)
    expect(profile.updated_at).toBe(now)
  })

  it('uses now when the existing profile has no created_at', () => {
    const profile = submitResumeProfile({ user_id: 'user-1' }, () => ({ created_at: null }), now)
    expect(profile.created_at).toBe(now)
  })

  it('rejects an experience without a company before looking anything up', () => {
    const lookup = vi.fn(noExisting)

    expect(() =>
      submitResumeProfile(
        { user_id: 'user-1', experiences: [{ role: 'Analyst', start: '2021', end: '2022' }] },
        lookup,
        now
      )
    ).toThrow(ValidationError)
    expect(lookup).not.toHaveBeenCalled()
  })

  it('reports the path of each missing sub-record field', () => {
    const issues = issuesFor({
      user_id: 'user-1',
      experiences: [{ company: 'Acme', role: 'Analyst', start: '2021', end: '2022' }, { company: 'Beta' }],
      education: [{ school: 'State U', degree: 'BSc', start: '2017' }],
      projects: [{ link: 'https://example.com' }]
    })

    expect(issues.map((issue) => issue.path)).toEqual([
      'experiences.1.role',
      'experiences.1.start',
      'experiences.1.end',
      'education.0.end',
      'projects.0.name'
    ])
  })

  it('requires user_id and list-typed collections', () => {
    expect(issuesFor({ skills: 'SQL' }).map((issue) => issue.path)).toEqual(['user_id', 'skills'])
  })
})
