import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env when running locally; deployments supply env vars directly and tests set their own
if (process.env.NODE_ENV !== 'test') {
  loadEnv()
}

export const SERVICE_NAME = 'career-coach-api'

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  // Unset leaves the document store unconfigured; store-backed routes then answer 500.
  DATABASE_PATH: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
  SQLITE_MIGRATIONS_DIR: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  DRAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
})

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse(process.env)
