import { DEFAULT_RECENT_QUIZ_LIMIT, type QuizStats } from '@shared/types'
import { logger } from '../../logger'
import type { Clock } from '../../utils/timestamps'
import { submitQuizResult } from './quiz.normalizer'
import { QuizRepository, type QuizResultRecord } from './quiz.repository'
import { selectRecentResults, summarizeQuizResults } from './quiz.stats'

export class QuizService {
  private log = logger.child({ module: 'QuizService' })

  constructor(
    private readonly repo: QuizRepository = new QuizRepository(),
    private readonly clock: Clock = () => new Date()
  ) {}

  /** Validates then appends; returns the store-assigned record id. */
  submit(input: unknown): string {
    const result = submitQuizResult(input, this.clock())
    const id = this.repo.insert(result)
    this.log.debug({ id, userId: result.user_id, score: result.score }, 'Quiz result recorded')
    return id
  }

  // Scans the user's full history; there is no cap on records read.
  computeQuizStats(userId: string): QuizStats {
    return summarizeQuizResults(this.repo.listByUser(userId))
  }

  listRecentQuizResults(userId: string, limit: number = DEFAULT_RECENT_QUIZ_LIMIT): QuizResultRecord[] {
    return selectRecentResults(this.repo.listByUser(userId), limit)
  }
}
