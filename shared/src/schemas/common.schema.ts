import { z } from "zod"

/** Optional free text: absent and null both normalise to null. */
export const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? null)

export const userIdSchema = z.string().min(1, "user_id must not be empty")

// ISO string that can be parsed by Date
export const isoTimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid date string" })
