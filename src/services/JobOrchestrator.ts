import { logger } from '../infra/logger.js';
import type { JobService } from './JobService.js';
import type { IngestionDecider } from './IngestionDecider.js';
import type { Sleep } from './BackoffExecutor.js';
import { executeWithBackoff } from './BackoffExecutor.js';
import type { Job, JobErrorPayload } from '../domain/entities/Job.js';
import { isTerminalStatus } from '../domain/entities/Job.js';
import type { IngestionResult } from '../domain/entities/IngestionResult.js';
import { serializeJobResult } from '../domain/entities/IngestionResult.js';
import type { NormalizedProduct } from '../domain/entities/Product.js';
import type { JobQueue, JobUnit } from '../domain/ports/JobQueue.js';
import type { ProductExtractor } from '../domain/ports/ProductExtractor.js';
import type { JobListFilter } from '../domain/ports/JobStore.js';
import { isAppError, isRetryableError, toErrorMessage } from '../domain/errors.js';
import type { Env } from '../infra/env.js';

export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
};

export function retryPolicyFromEnv(
  env: Pick<Env, 'JOB_MAX_ATTEMPTS' | 'JOB_INITIAL_DELAY_MS' | 'JOB_BACKOFF_FACTOR'>
): RetryPolicy {
  return {
    maxAttempts: env.JOB_MAX_ATTEMPTS,
    initialDelayMs: env.JOB_INITIAL_DELAY_MS,
    backoffFactor: env.JOB_BACKOFF_FACTOR,
  };
}

type Ingested = { product: NormalizedProduct; ingestion: IngestionResult };

type ExecutionOutcome = { ok: true; value: Ingested } | { ok: false; error: JobErrorPayload };

/**
 * JobOrchestrator - coordinates submission and worker-side execution
 * Lifecycle writes go through JobService; product writes through IngestionDecider.
 */
export class JobOrchestrator {
  constructor(
    private jobService: JobService,
    private queue: JobQueue,
    private extractor: ProductExtractor,
    private decider: IngestionDecider,
    private retryPolicy: RetryPolicy,
    private sleep?: Sleep
  ) {}

  /**
   * Creates a pending job and hands it to the queue. Never waits on
   * extraction; store or queue faults surface to the caller.
   */
  async submit(naturalKey: string): Promise<Job> {
    const job = await this.jobService.createJob(naturalKey);
    this.queue.enqueue({ jobId: job.id, naturalKey: job.naturalKey });
    logger.info('Job enqueued', { jobId: job.id, naturalKey: job.naturalKey });
    return job;
  }

  async getJob(jobId: string): Promise<Job> {
    return this.jobService.getJob(jobId);
  }

  async listJobs(filter: JobListFilter = {}): Promise<Job[]> {
    return this.jobService.listJobs(filter);
  }

  /**
   * Re-enqueues jobs still pending in the store, e.g. after a restart
   * dropped the in-process queue
   */
  async requeuePendingJobs(): Promise<number> {
    const pending = await this.jobService.listJobsByStatus('pending');
    for (const job of pending) {
      this.queue.enqueue({ jobId: job.id, naturalKey: job.naturalKey });
    }
    if (pending.length > 0) {
      logger.info('Pending jobs re-enqueued', { count: pending.length });
    }
    return pending.length;
  }

  /**
   * Worker entry point for one dequeued unit. Execution faults end in a
   * failed job rather than a rejection; only job-store faults propagate.
   */
  async executeJob(unit: JobUnit): Promise<Job | null> {
    const job = await this.jobService.findJob(unit.jobId);
    if (!job) {
      logger.warn('Dequeued unknown job, ignoring', { jobId: unit.jobId });
      return null;
    }

    if (isTerminalStatus(job.status)) {
      logger.warn('Dequeued job already finished, ignoring', { jobId: job.id, status: job.status });
      return job;
    }

    if (job.status === 'pending') {
      await this.jobService.markJobInProgress(job.id);
    } else {
      logger.warn('Resuming redelivered job', { jobId: job.id, status: job.status });
    }

    const outcome = await this.run(job);

    if (!outcome.ok) {
      return this.jobService.markJobFailed(job.id, outcome.error);
    }

    const { product, ingestion } = outcome.value;
    const result = serializeJobResult({
      outcome: ingestion.outcome,
      productId: ingestion.productId,
      naturalKey: product.naturalKey,
      price: product.price,
      save: product.save,
      observedAt: product.observedAt.toISOString(),
    });
    return this.jobService.markJobCompleted(job.id, { result, productId: ingestion.productId });
  }

  private async run(job: Job): Promise<ExecutionOutcome> {
    let attempts = 0;

    try {
      const value = await executeWithBackoff<Ingested>(
        async () => {
          attempts += 1;
          const product = await this.extractor.fetch(job.naturalKey);
          if (!product) return null;
          const ingestion = await this.decider.ingest(product);
          return { product, ingestion };
        },
        {
          ...this.retryPolicy,
          retryOnEmptyResult: true,
          shouldRetry: isRetryableError,
          sleep: this.sleep,
          onRetry: ({ attempt, maxAttempts, delayMs, error, empty }) => {
            logger.warn('Job attempt failed, retrying', {
              jobId: job.id,
              attempt,
              maxAttempts,
              delayMs,
              reason: empty ? 'product not found' : toErrorMessage(error),
            });
          },
          onGiveUp: ({ attempt, maxAttempts, error, empty }) => {
            logger.error('Job attempts exhausted', {
              jobId: job.id,
              attempt,
              maxAttempts,
              reason: empty ? 'product not found' : toErrorMessage(error),
            });
          },
        }
      );

      if (!value) {
        return {
          ok: false,
          error: {
            code: 'PRODUCT_NOT_FOUND',
            message: `No product found for ${job.naturalKey} after ${attempts} attempts`,
            attempts,
          },
        };
      }
      return { ok: true, value };
    } catch (error) {
      return {
        ok: false,
        error: {
          code: isAppError(error) ? error.code : 'UNEXPECTED_ERROR',
          message: toErrorMessage(error),
          attempts,
        },
      };
    }
  }
}
