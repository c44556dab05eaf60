import type { Job, JobErrorPayload, JobStatus } from '../entities/Job.js';

export type JobTransition = {
  jobId: string;
  from: JobStatus;
  to: JobStatus;
  updatedAt: Date;
  result?: string | null;
  productId?: number | null;
  error?: JobErrorPayload | null;
};

export type JobListFilter = {
  status?: JobStatus;
  naturalKey?: string;
  limit?: number;
};

/**
 * Durable job records. `transition` is a compare-and-set on the current
 * status and resolves to false when the job was not in `from`.
 */
export interface JobStore {
  create(job: Job): Promise<void>;
  getById(jobId: string): Promise<Job | null>;
  transition(change: JobTransition): Promise<boolean>;
  list(filter: JobListFilter): Promise<Job[]>;
  /** Oldest update first; `updatedBefore` keeps only rows last touched before that instant. */
  listByStatus(status: JobStatus, options?: { updatedBefore?: Date }): Promise<Job[]>;
}
