import { EMPTY_QUIZ_STATS, type QuizStats } from '@shared/types'
import type { QuizResultRecord } from './quiz.repository'

type Timed = Pick<QuizResultRecord, 'created_at'>

// Missing timestamps sort as the earliest possible instant.
const instantOf = (record: Timed): number => record.created_at?.getTime() ?? Number.NEGATIVE_INFINITY

/**
 * Mean of the scores, rounded half-up to two decimals.
 * Worked in integer hundredths: floor((200 * sum + n) / (2 * n)) / 100.
 */
export function averageScore(scores: number[]): number {
  if (scores.length === 0) return 0
  const sum = scores.reduce((total, score) => total + score, 0)
  const n = scores.length
  return Math.floor((200 * sum + n) / (2 * n)) / 100
}

/** The record with the greatest created_at; among equals the later one in store order wins. */
export function latestResult<T extends Timed>(records: T[]): T | null {
  let latest: T | null = null
  let latestInstant = Number.NEGATIVE_INFINITY
  for (const record of records) {
    const instant = instantOf(record)
    if (latest === null || instant >= latestInstant) {
      latest = record
      latestInstant = instant
    }
  }
  return latest
}

export function summarizeQuizResults(records: QuizResultRecord[]): QuizStats {
  if (records.length === 0) {
    return { ...EMPTY_QUIZ_STATS }
  }

  return {
    average_score: averageScore(records.map((record) => record.score)),
    total_questions: records.reduce((total, record) => total + Math.trunc(record.total_questions), 0),
    latest_score: latestResult(records)?.score ?? 0,
    count: records.length
  }
}

/** Newest first, stable for equal instants, truncated to limit. */
export function selectRecentResults<T extends Timed>(records: T[], limit: number): T[] {
  return [...records]
    .sort((a, b) => {
      const left = instantOf(a)
      const right = instantOf(b)
      if (left === right) return 0
      return right > left ? 1 : -1
    })
    .slice(0, limit)
}
