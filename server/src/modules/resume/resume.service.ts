import { logger } from '../../logger'
import type { Clock } from '../../utils/timestamps'
import { submitResumeProfile } from './resume.normalizer'
import { ResumeRepository, type ResumeProfileRecord } from './resume.repository'

export class ResumeService {
  private log = logger.child({ module: 'ResumeService' })

  constructor(
    private readonly repo: ResumeRepository = new ResumeRepository(),
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Creates or fully replaces the user's resume. Concurrent writers race;
   * the last write wins.
   */
  upsert(input: unknown): void {
    const profile = submitResumeProfile(input, (userId) => this.repo.findCreatedAt(userId), this.clock())
    this.repo.upsert(profile)
    this.log.debug({ userId: profile.user_id }, 'Resume profile saved')
  }

  /** null means the user has no resume yet. */
  get(userId: string): ResumeProfileRecord | null {
    return this.repo.getByUserId(userId)
  }
}
