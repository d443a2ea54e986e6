/**
 * Quiz result as served by the API. Timestamps are ISO-8601 strings; they are
 * null only for documents written without one.
 */
export interface QuizResult {
  id: string
  user_id: string
  score: number
  total_questions: number
  correct_answers: number
  feedback: string | null
  created_at: string | null
  updated_at: string | null
}

/**
 * Summary of a user's quiz history.
 * average_score is rounded half-up to two decimals.
 */
export interface QuizStats {
  average_score: number
  total_questions: number
  latest_score: number
  count: number
}

export const EMPTY_QUIZ_STATS: Readonly<QuizStats> = Object.freeze({
  average_score: 0,
  total_questions: 0,
  latest_score: 0,
  count: 0
})

export const DEFAULT_RECENT_QUIZ_LIMIT = 5
