import OpenAI, { APIError } from 'openai'
import type { ParsedCoverLetterRequest } from '@shared/types'
import { env } from '../../config/env'
import { NotConfiguredError, UpstreamError } from '../../errors'
import { logger } from '../../logger'
import { truncate } from '../../utils/truncate'
import { buildCoverLetterPrompt, COVER_LETTER_SYSTEM_PROMPT } from './cover-letter.prompts'

const UPSTREAM_MESSAGE_LIMIT = 200

export interface CoverLetterGenerator {
  generate(request: ParsedCoverLetterRequest): Promise<string>
}

interface CoverLetterServiceOptions {
  /** Falls back to OPENAI_API_KEY, read on every call. */
  apiKey?: string
  model?: string
}

/**
 * Single request/response call to the OpenAI chat completions API.
 * Failures surface immediately; the client is built with retries disabled.
 */
export class CoverLetterService implements CoverLetterGenerator {
  private client: OpenAI | null = null
  private clientKey: string | null = null
  private log = logger.child({ module: 'CoverLetterService' })

  constructor(private readonly options: CoverLetterServiceOptions = {}) {}

  async generate(request: ParsedCoverLetterRequest): Promise<string> {
    const client = this.getClient()
    const model = this.options.model ?? env.OPENAI_MODEL

    try {
      const completion = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: COVER_LETTER_SYSTEM_PROMPT },
          { role: 'user', content: buildCoverLetterPrompt(request) }
        ],
        temperature: 0.7
      })
      const text = completion.choices[0]?.message?.content ?? ''
      this.log.debug({ model, length: text.length }, 'Cover letter generated')
      return text
    } catch (error) {
      this.log.error({ err: error, model }, 'OpenAI request failed')
      // APIConnectionError is an APIError without a status; treat it as transport failure.
      if (error instanceof APIError && error.status !== undefined) {
        throw new UpstreamError(`OpenAI error: ${truncate(error.message, UPSTREAM_MESSAGE_LIMIT)}`, { cause: error })
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new UpstreamError(truncate(message, UPSTREAM_MESSAGE_LIMIT), { cause: error })
    }
  }

  private getClient(): OpenAI {
    const apiKey = (this.options.apiKey ?? process.env.OPENAI_API_KEY ?? '').trim()
    if (!apiKey) {
      throw new NotConfiguredError('OPENAI_API_KEY not set', { status: 400 })
    }
    if (!this.client || this.clientKey !== apiKey) {
      this.client = new OpenAI({ apiKey, timeout: 30_000, maxRetries: 0 })
      this.clientKey = apiKey
    }
    return this.client
  }
}
