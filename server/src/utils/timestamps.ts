/** Reads an ISO timestamp written by the store mapping; anything else maps to null. */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') return null
  const parsed = new Date(value)
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

export function toIsoString(value: Date | null): string | null {
  return value ? value.toISOString() : null
}

export type Clock = () => Date
