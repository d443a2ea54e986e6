import { z } from "zod"
import type { ResumeProfile } from "../resume.types"
import { isoTimestampSchema, optionalTextSchema, userIdSchema } from "./common.schema"

export const resumeExperienceSchema = z.object({
  company: z.string(),
  role: z.string(),
  start: z.string(),
  end: z.string(),
  description: optionalTextSchema,
})

export const resumeEducationSchema = z.object({
  school: z.string(),
  degree: z.string(),
  start: z.string(),
  end: z.string(),
  details: optionalTextSchema,
})

export const resumeProjectSchema = z.object({
  name: z.string(),
  link: optionalTextSchema,
  description: optionalTextSchema,
})

/** Body of POST /api/resume. Unknown keys are stripped. */
export const resumeProfilePayloadSchema = z.object({
  user_id: userIdSchema,
  email: optionalTextSchema,
  linkedin: optionalTextSchema,
  twitter: optionalTextSchema,
  summary: optionalTextSchema,
  skills: z.array(z.string()).default([]),
  experiences: z.array(resumeExperienceSchema).default([]),
  education: z.array(resumeEducationSchema).default([]),
  projects: z.array(resumeProjectSchema).default([]),
})

export type ResumeProfilePayload = z.input<typeof resumeProfilePayloadSchema>
export type ParsedResumeProfilePayload = z.output<typeof resumeProfilePayloadSchema>

export const resumeProfileSchema: z.ZodType<ResumeProfile, z.ZodTypeDef, unknown> = resumeProfilePayloadSchema.extend({
  created_at: isoTimestampSchema.nullable(),
  updated_at: isoTimestampSchema.nullable(),
})
