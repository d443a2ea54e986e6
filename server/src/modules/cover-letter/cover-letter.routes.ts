import { Router } from 'express'
import { coverLetterRequestSchema, type CoverLetterResponse } from '@shared/types'
import { asyncHandler } from '../../utils/async-handler'
import { parseOrThrow } from '../../utils/validation'
import { CoverLetterService, type CoverLetterGenerator } from './cover-letter.service'

interface CoverLetterRouterOptions {
  generator?: CoverLetterGenerator
}

export function buildCoverLetterRouter(options: CoverLetterRouterOptions = {}) {
  const router = Router()
  const generator = options.generator ?? new CoverLetterService()

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const request = parseOrThrow(coverLetterRequestSchema, req.body)
      const text = await generator.generate(request)
      const response: CoverLetterResponse = { text }
      res.json(response)
    })
  )

  return router
}
