import { Router } from 'express'
import { z } from 'zod'
import { userIdSchema, type GetResumeProfileResponse, type WriteAcknowledgement } from '@shared/types'
import { asyncHandler } from '../../utils/async-handler'
import { toIsoString } from '../../utils/timestamps'
import { parseOrThrow } from '../../utils/validation'
import { ResumeService } from './resume.service'

const getQuerySchema = z.object({
  user_id: userIdSchema
})

interface ResumeRouterOptions {
  service?: ResumeService
}

export function buildResumeRouter(options: ResumeRouterOptions = {}) {
  const router = Router()
  const service = options.service ?? new ResumeService()

  router.post(
    '/',
    asyncHandler((req, res) => {
      service.upsert(req.body)
      const response: WriteAcknowledgement = { ok: true }
      res.json(response)
    })
  )

  router.get(
    '/',
    asyncHandler((req, res) => {
      const query = parseOrThrow(getQuerySchema, req.query)
      const profile = service.get(query.user_id)
      const response: GetResumeProfileResponse = profile
        ? { ...profile, created_at: toIsoString(profile.created_at), updated_at: toIsoString(profile.updated_at) }
        : {}
      res.json(response)
    })
  )

  return router
}
