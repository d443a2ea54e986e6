import { z } from "zod"
import type { QuizResult, QuizStats } from "../quiz.types"
import { isoTimestampSchema, optionalTextSchema, userIdSchema } from "./common.schema"

/**
 * Body of POST /api/quiz. correct_answers is not checked against
 * total_questions. Counts stay within the safe integer range so they sum
 * exactly in QuizStats.
 */
export const quizResultPayloadSchema = z.object({
  user_id: userIdSchema,
  score: z.number().int().min(0).max(100),
  total_questions: z.number().int().min(1).max(Number.MAX_SAFE_INTEGER),
  correct_answers: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
  feedback: optionalTextSchema,
})

export type QuizResultPayload = z.input<typeof quizResultPayloadSchema>
export type ParsedQuizResultPayload = z.output<typeof quizResultPayloadSchema>

export const quizResultSchema: z.ZodType<QuizResult> = z.object({
  id: z.string().min(1),
  user_id: z.string(),
  score: z.number().int(),
  total_questions: z.number().int(),
  correct_answers: z.number().int(),
  feedback: z.string().nullable(),
  created_at: isoTimestampSchema.nullable(),
  updated_at: isoTimestampSchema.nullable(),
})

export const quizStatsSchema: z.ZodType<QuizStats> = z.object({
  average_score: z.number().min(0).max(100),
  total_questions: z.number().int().min(0),
  latest_score: z.number().int().min(0).max(100),
  count: z.number().int().min(0),
})
