import express from 'express'
import request from 'supertest'
import { describe, expect, it } from 'vitest'
import type { CoverLetterRequest, ParsedCoverLetterRequest } from '@shared/types'
import { buildCoverLetterRouter } from '../cover-letter.routes'
import type { CoverLetterGenerator } from '../cover-letter.service'
import { apiErrorHandler } from '../../../middleware/api-error'
import { NotConfiguredError, UpstreamError } from '../../../errors'

class FakeGenerator implements CoverLetterGenerator {
  readonly requests: ParsedCoverLetterRequest[] = []

  constructor(private readonly outcome: () => Promise<string>) {}

  generate(request: ParsedCoverLetterRequest): Promise<string> {
    this.requests.push(request)
    return this.outcome()
  }
}

function buildTestApp(generator: CoverLetterGenerator) {
  const app = express()
  app.use(express.json())
  app.use('/api/cover-letter', buildCoverLetterRouter({ generator }))
  app.use(apiErrorHandler)
  return app
}

const body: CoverLetterRequest = { company_name: 'Acme', job_title: 'Data Analyst', job_description: 'Build dashboards.' }

describe('cover letter routes', () => {
  it('returns the generated text', async () => {
    const generator = new FakeGenerator(async () => 'Dear hiring team,')

    const res = await request(buildTestApp(generator)).post('/api/cover-letter').send(body).expect(200)

    expect(res.body).toEqual({ text: 'Dear hiring team,' })
    expect(generator.requests).toEqual([{ ...body, user_name: null }])
  })

  it('rejects a request without a job title before calling the generator', async () => {
    const generator = new FakeGenerator(async () => 'unused')

    const res = await request(buildTestApp(generator))
      .post('/api/cover-letter')
      .send({ company_name: 'Acme', job_description: 'Build dashboards.' })
      .expect(422)

    expect(res.body.error.details.issues).toEqual([{ path: 'job_title', message: 'Required' }])
    expect(generator.requests).toEqual([])
  })

  it('answers 400 when the credential is missing', async () => {
    const generator = new FakeGenerator(async () => {
      throw new NotConfiguredError('OPENAI_API_KEY not set', { status: 400 })
    })

    const res = await request(buildTestApp(generator)).post('/api/cover-letter').send(body).expect(400)

    expect(res.body.error).toMatchObject({ code: 'NOT_CONFIGURED', message: 'OPENAI_API_KEY not set' })
  })

  it('answers 502 when the provider fails', async () => {
    const generator = new FakeGenerator(async () => {
      throw new UpstreamError('OpenAI error: quota exceeded')
    })

    const res = await request(buildTestApp(generator)).post('/api/cover-letter').send(body).expect(502)

    expect(res.body).toMatchObject({
      success: false,
      error: { code: 'UPSTREAM_ERROR', message: 'OpenAI error: quota exceeded' }
    })
  })
})
