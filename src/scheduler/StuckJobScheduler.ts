import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { StuckJobMonitor } from '../services/StuckJobMonitor.js';
import { toErrorMessage } from '../domain/errors.js';

/**
 * StuckJobScheduler - runs the stuck job check every N minutes using node-cron
 */
export class StuckJobScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private monitor: Pick<StuckJobMonitor, 'findStuckJobs'>,
    private intervalMinutes: number
  ) {}

  static cronExpression(intervalMinutes: number): string {
    if (!Number.isInteger(intervalMinutes) || intervalMinutes < 1 || intervalMinutes > 59) {
      throw new RangeError(`intervalMinutes must be an integer in 1..59, got ${intervalMinutes}`);
    }
    return `*/${intervalMinutes} * * * *`;
  }

  start(): void {
    if (this.task) return;

    const cronExpression = StuckJobScheduler.cronExpression(this.intervalMinutes);
    this.task = cron.schedule(cronExpression, () => this.runCheck());

    logger.info('StuckJobScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('StuckJobScheduler stopped');
    }
  }

  async runCheck(): Promise<void> {
    try {
      const stuck = await this.monitor.findStuckJobs();
      logger.debug('Stuck job check finished', { stuck: stuck.length });
    } catch (error) {
      logger.error('Stuck job check failed', { error: toErrorMessage(error) });
    }
  }
}
