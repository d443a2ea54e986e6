import type { z } from 'zod'
import { ValidationError } from '../errors'

/** Parses with a zod schema, raising ValidationError with per-field issues on failure. */
export function parseOrThrow<TSchema extends z.ZodTypeAny>(schema: TSchema, value: unknown): z.output<TSchema> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error)
  }
  return parsed.data
}
