import type { DocumentBody, DocumentStoreProvider, StoredDocument } from '../../db/document-store'
import { getDocumentStore, requireStore } from '../../db/store'
import { parseTimestamp } from '../../utils/timestamps'
import type { ValidatedQuizResult } from './quiz.normalizer'

export const QUIZ_COLLECTION = 'quiz'

/** A quiz document read back from the store. */
export interface QuizResultRecord {
  id: string
  user_id: string
  score: number
  total_questions: number
  correct_answers: number
  feedback: string | null
  created_at: Date | null
  updated_at: Date | null
}

const numberOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback

export function toQuizDocument(result: ValidatedQuizResult): DocumentBody {
  return {
    user_id: result.user_id,
    score: result.score,
    total_questions: result.total_questions,
    correct_answers: result.correct_answers,
    feedback: result.feedback,
    created_at: result.created_at.toISOString(),
    updated_at: result.updated_at.toISOString()
  }
}

// Documents may predate the current write path, so absent fields fall back to zero/null.
export function fromQuizDocument(document: StoredDocument): QuizResultRecord {
  const { body } = document
  return {
    id: document.id,
    user_id: typeof body.user_id === 'string' ? body.user_id : '',
    score: numberOr(body.score, 0),
    total_questions: numberOr(body.total_questions, 0),
    correct_answers: numberOr(body.correct_answers, 0),
    feedback: typeof body.feedback === 'string' ? body.feedback : null,
    created_at: parseTimestamp(body.created_at),
    updated_at: parseTimestamp(body.updated_at)
  }
}

export class QuizRepository {
  constructor(private readonly storeProvider: DocumentStoreProvider = getDocumentStore) {}

  /** Appends a new quiz document; there is no uniqueness constraint. */
  insert(result: ValidatedQuizResult): string {
    const store = requireStore(this.storeProvider)
    return store.insertOne(QUIZ_COLLECTION, toQuizDocument(result))
  }

  /** Every quiz document for the user, in insertion order. Unbounded. */
  listByUser(userId: string): QuizResultRecord[] {
    const store = requireStore(this.storeProvider)
    return store.find(QUIZ_COLLECTION, { user_id: userId }).map(fromQuizDocument)
  }
}
