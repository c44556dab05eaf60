import { logger } from '../infra/logger.js';
import type { JobQueue, JobUnit } from '../domain/ports/JobQueue.js';
import { toErrorMessage } from '../domain/errors.js';

export type JobHandler = (unit: JobUnit) => Promise<unknown>;

export type WorkerPoolOptions = {
  concurrency: number;
};

/**
 * WorkerPool - N loops pulling units off the queue until it is closed.
 * A handler rejection is logged and the loop moves on to the next unit.
 */
export class WorkerPool {
  private loops: Promise<void>[] = [];
  private running = false;

  constructor(
    private queue: JobQueue,
    private handler: JobHandler,
    private options: WorkerPoolOptions
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1, got ${options.concurrency}`);
    }
  }

  start(): void {
    if (this.running) {
      logger.warn('WorkerPool already started');
      return;
    }
    this.running = true;
    for (let worker = 1; worker <= this.options.concurrency; worker += 1) {
      this.loops.push(this.loop(worker));
    }
    logger.info('WorkerPool started', { concurrency: this.options.concurrency });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Closes the queue and waits for in-flight units to finish.
   * Units still queued are drained before the loops exit.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.queue.close();
    await Promise.all(this.loops);
    this.loops = [];
    this.running = false;
    logger.info('WorkerPool stopped');
  }

  private async loop(worker: number): Promise<void> {
    for (;;) {
      const unit = await this.queue.dequeue();
      if (!unit) return;

      try {
        await this.handler(unit);
      } catch (error) {
        logger.error('Worker failed to process job', {
          worker,
          jobId: unit.jobId,
          naturalKey: unit.naturalKey,
          error: toErrorMessage(error),
        });
      }
    }
  }
}
