import { Router } from 'express'
import { z } from 'zod'
import {
  DEFAULT_RECENT_QUIZ_LIMIT,
  userIdSchema,
  type CreateQuizResultResponse,
  type QuizResult,
  type QuizStats
} from '@shared/types'
import { asyncHandler } from '../../utils/async-handler'
import { toIsoString } from '../../utils/timestamps'
import { parseOrThrow } from '../../utils/validation'
import type { QuizResultRecord } from './quiz.repository'
import { QuizService } from './quiz.service'

const statsQuerySchema = z.object({
  user_id: userIdSchema
})

// No upper bound on limit. limit=0 is a validation error, not "no limit";
// callers that want every result pass a limit at least as large as the history.
const recentQuerySchema = statsQuerySchema.extend({
  limit: z.coerce.number().int().min(1).default(DEFAULT_RECENT_QUIZ_LIMIT)
})

export function toQuizResult(record: QuizResultRecord): QuizResult {
  return {
    ...record,
    created_at: toIsoString(record.created_at),
    updated_at: toIsoString(record.updated_at)
  }
}

interface QuizRouterOptions {
  service?: QuizService
}

export function buildQuizRouter(options: QuizRouterOptions = {}) {
  const router = Router()
  const service = options.service ?? new QuizService()

  router.post(
    '/',
    asyncHandler((req, res) => {
      const id = service.submit(req.body)
      const response: CreateQuizResultResponse = { id, ok: true }
      res.json(response)
    })
  )

  router.get(
    '/stats',
    asyncHandler((req, res) => {
      const query = parseOrThrow(statsQuerySchema, req.query)
      const response: QuizStats = service.computeQuizStats(query.user_id)
      res.json(response)
    })
  )

  router.get(
    '/recent',
    asyncHandler((req, res) => {
      const query = parseOrThrow(recentQuerySchema, req.query)
      const response: QuizResult[] = service.listRecentQuizResults(query.user_id, query.limit).map(toQuizResult)
      res.json(response)
    })
  )

  return router
}
