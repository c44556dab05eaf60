export type JobUnit = {
  jobId: string;
  naturalKey: string;
};

export interface JobQueue {
  enqueue(unit: JobUnit): void;
  /** Resolves with the next unit, or null once the queue is closed and drained. */
  dequeue(): Promise<JobUnit | null>;
  close(): void;
  size(): number;
}
