import { logger } from '../infra/logger.js';
import type { JobService } from './JobService.js';
import type { Job } from '../domain/entities/Job.js';
import type { Clock } from '../domain/clock.js';
import { systemClock } from '../domain/clock.js';

/**
 * Reports jobs left in progress longer than the threshold.
 * Reporting only: there is no cancellation, so a stuck job is never failed here.
 */
export class StuckJobMonitor {
  constructor(
    private jobService: JobService,
    private thresholdMinutes: number,
    private clock: Clock = systemClock
  ) {}

  async findStuckJobs(now: Date = this.clock()): Promise<Job[]> {
    const cutoff = new Date(now.getTime() - this.thresholdMinutes * 60_000);
    const stuck = await this.jobService.listJobsByStatus('in_progress', { updatedBefore: cutoff });

    for (const job of stuck) {
      logger.warn('Job stuck in progress', {
        jobId: job.id,
        naturalKey: job.naturalKey,
        updatedAt: job.updatedAt.toISOString(),
        minutesInProgress: Math.floor((now.getTime() - job.updatedAt.getTime()) / 60_000),
      });
    }
    return stuck;
  }
}
