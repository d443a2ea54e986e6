/**
 * @shared/types
 *
 * Shared TypeScript types for the career coach API and its clients
 */

// Domain types
export * from "./quiz.types"
export * from "./resume.types"
export * from "./cover-letter.types"
export * from "./insights.types"
export * from "./diagnostics.types"

// API types
export * from "./api.types"

// Runtime schemas (Zod)
export * from "./schemas"
