import { z } from "zod"
import { optionalTextSchema } from "./common.schema"

export const coverLetterRequestSchema = z.object({
  company_name: z.string(),
  job_title: z.string(),
  job_description: z.string(),
  user_name: optionalTextSchema,
})

/** Body of POST /api/cover-letter as a client sends it. */
export type CoverLetterRequest = z.input<typeof coverLetterRequestSchema>
export type ParsedCoverLetterRequest = z.output<typeof coverLetterRequestSchema>
