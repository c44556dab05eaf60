import { randomUUID } from 'node:crypto';
import type { Job, JobErrorPayload, JobStatus } from '../domain/entities/Job.js';
import { canTransition, createJob } from '../domain/entities/Job.js';
import type { JobListFilter, JobStore } from '../domain/ports/JobStore.js';
import type { Clock } from '../domain/clock.js';
import { systemClock } from '../domain/clock.js';
import { JobStateError, NotFoundError, ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * JobService - manages job lifecycle and status updates
 * Every transition is checked against the state machine and written as a
 * compare-and-set, so a concurrent or replayed writer cannot move a job
 * backwards or out of a terminal state.
 */
export class JobService {
  constructor(
    private jobStore: JobStore,
    private clock: Clock = systemClock,
    private newId: () => string = randomUUID
  ) {}

  async createJob(naturalKey: string): Promise<Job> {
    const key = naturalKey.trim();
    if (key.length === 0) {
      throw new ValidationError('naturalKey must be a non-empty string');
    }

    const job = createJob({ id: this.newId(), naturalKey: key, now: this.clock() });
    await this.jobStore.create(job);
    logger.info('Job created', { jobId: job.id, naturalKey: job.naturalKey, status: job.status });
    return job;
  }

  async findJob(jobId: string): Promise<Job | null> {
    return this.jobStore.getById(jobId);
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.jobStore.getById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  async listJobs(filter: JobListFilter = {}): Promise<Job[]> {
    return this.jobStore.list(filter);
  }

  async listJobsByStatus(status: JobStatus, options: { updatedBefore?: Date } = {}): Promise<Job[]> {
    return this.jobStore.listByStatus(status, options);
  }

  async markJobInProgress(jobId: string): Promise<Job> {
    const job = await this.transition(jobId, 'in_progress', {});
    logger.info('Job in progress', { jobId });
    return job;
  }

  async markJobCompleted(jobId: string, params: { result: string; productId: number | null }): Promise<Job> {
    const job = await this.transition(jobId, 'completed', {
      result: params.result,
      productId: params.productId,
    });
    logger.info('Job completed', { jobId, productId: params.productId });
    return job;
  }

  async markJobFailed(jobId: string, error: JobErrorPayload): Promise<Job> {
    const job = await this.transition(jobId, 'failed', { error });
    logger.info('Job failed', { jobId, code: error.code, reason: error.message, attempts: error.attempts });
    return job;
  }

  private async transition(
    jobId: string,
    to: JobStatus,
    fields: { result?: string; productId?: number | null; error?: JobErrorPayload }
  ): Promise<Job> {
    const job = await this.getJob(jobId);
    this.assertJobTransition(job.status, to);

    // updated_at never moves backwards, even if the wall clock does
    const now = this.clock();
    const updatedAt = now.getTime() < job.updatedAt.getTime() ? job.updatedAt : now;

    const applied = await this.jobStore.transition({ jobId, from: job.status, to, updatedAt, ...fields });
    if (!applied) {
      throw new JobStateError(`Job ${jobId} changed status concurrently; ${job.status} -> ${to} not applied`, {
        jobId,
        from: job.status,
        to,
      });
    }

    return {
      ...job,
      status: to,
      updatedAt,
      result: fields.result ?? job.result,
      productId: fields.productId ?? job.productId,
      error: fields.error ?? job.error,
    };
  }

  private assertJobTransition(from: JobStatus, to: JobStatus): void {
    if (!canTransition(from, to)) {
      throw new JobStateError(`Invalid job status transition: ${from} -> ${to}`, { from, to });
    }
  }
}
