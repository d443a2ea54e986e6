export interface ResumeExperience {
  company: string
  role: string
  start: string
  end: string
  description: string | null
}

export interface ResumeEducation {
  school: string
  degree: string
  start: string
  end: string
  details: string | null
}

export interface ResumeProject {
  name: string
  link: string | null
  description: string | null
}

/** One resume per user_id; later writes replace every field but created_at. */
export interface ResumeProfile {
  user_id: string
  email: string | null
  linkedin: string | null
  twitter: string | null
  summary: string | null
  skills: string[]
  experiences: ResumeExperience[]
  education: ResumeEducation[]
  projects: ResumeProject[]
  created_at: string | null
  updated_at: string | null
}

/** GET /api/resume answers with an empty object when the user has no resume yet. */
export type GetResumeProfileResponse = ResumeProfile | Record<string, never>
