import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { ApiErrorCode } from '@shared/types'
import { env } from './config/env'
import { httpLogger, logger } from './logger'
import type { DocumentStoreProvider } from './db/document-store'
import { getDocumentStore } from './db/store'
import { ApiHttpError, apiErrorHandler } from './middleware/api-error'
import { healthHandler, rootHandler } from './routes/health'
import { buildDiagnosticsHandler } from './routes/diagnostics'
import { buildQuizRouter } from './modules/quiz/quiz.routes'
import { QuizRepository } from './modules/quiz/quiz.repository'
import { QuizService } from './modules/quiz/quiz.service'
import { buildResumeRouter } from './modules/resume/resume.routes'
import { ResumeRepository } from './modules/resume/resume.repository'
import { ResumeService } from './modules/resume/resume.service'
import { buildCoverLetterRouter } from './modules/cover-letter/cover-letter.routes'
import type { CoverLetterGenerator } from './modules/cover-letter/cover-letter.service'
import { buildInsightsRouter } from './modules/insights/insights.routes'
import type { Clock } from './utils/timestamps'

export interface AppOptions {
  /** Document store handle shared by every store-backed route. */
  storeProvider?: DocumentStoreProvider
  coverLetterGenerator?: CoverLetterGenerator
  clock?: Clock
  /** Reported by GET /test; defaults to DATABASE_PATH. */
  databasePath?: string
}

export function buildApp(options: AppOptions = {}) {
  const app = express()
  const storeProvider = options.storeProvider ?? getDocumentStore
  const clock = options.clock ?? (() => new Date())
  const databasePath = 'databasePath' in options ? options.databasePath : env.DATABASE_PATH

  app.set('etag', false)
  app.use((_, res, next) => {
    res.set('Cache-Control', 'no-store')
    next()
  })

  app.use(helmet())

  // Unset CORS_ALLOWED_ORIGINS allows every origin.
  const allowedOrigins = env.CORS_ALLOWED_ORIGINS
    ? env.CORS_ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
    : []

  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps, curl, Postman)
        if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
          callback(null, true)
          return
        }
        logger.warn({ origin, allowedOrigins }, 'CORS request from disallowed origin')
        callback(null, false)
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      optionsSuccessStatus: 204
    })
  )
  app.use(httpLogger)
  app.use(express.json({ limit: '1mb' }))

  app.get('/', rootHandler)
  app.get('/healthz', healthHandler)
  app.get('/test', buildDiagnosticsHandler(storeProvider, databasePath))

  app.use('/api/quiz', buildQuizRouter({ service: new QuizService(new QuizRepository(storeProvider), clock) }))
  app.use('/api/resume', buildResumeRouter({ service: new ResumeService(new ResumeRepository(storeProvider), clock) }))
  app.use('/api/cover-letter', buildCoverLetterRouter({ generator: options.coverLetterGenerator }))
  app.use('/api/insights', buildInsightsRouter())

  app.use((req, _res, next) => {
    next(new ApiHttpError(ApiErrorCode.NOT_FOUND, 'Resource not found', { status: 404, details: { path: req.path } }))
  })

  app.use(apiErrorHandler)

  return app
}
