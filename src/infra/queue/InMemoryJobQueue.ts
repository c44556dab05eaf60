import type { JobQueue, JobUnit } from '../../domain/ports/JobQueue.js';

type Waiter = (unit: JobUnit | null) => void;

/**
 * Single-process queue: each enqueued unit is handed to exactly one
 * dequeue() caller. Waiting workers are served in arrival order.
 */
export class InMemoryJobQueue implements JobQueue {
  private items: JobUnit[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  enqueue(unit: JobUnit): void {
    if (this.closed) {
      throw new Error('Queue is closed');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(unit);
      return;
    }
    this.items.push(unit);
  }

  dequeue(): Promise<JobUnit | null> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<JobUnit | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stops accepting work. Units already queued are still delivered;
   * idle workers receive null.
   */
  close(): void {
    this.closed = true;
    const waiting = this.waiters;
    this.waiters = [];
    waiting.forEach((resolve) => resolve(null));
  }

  size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
