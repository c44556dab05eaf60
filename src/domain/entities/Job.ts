/**
 * Job entity - one asynchronous ingestion request for a product code
 * Status only moves forward: pending -> in_progress -> completed | failed
 */
export const JOB_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type JobErrorPayload = {
  code: string;
  message: string;
  attempts: number;
};

export interface Job {
  id: string;
  naturalKey: string;
  status: JobStatus;
  result: string | null;
  productId: number | null;
  error: JobErrorPayload | null;
  createdAt: Date;
  updatedAt: Date;
}

export const jobTransitions: Record<JobStatus, JobStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return jobTransitions[status].length === 0;
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

/**
 * Factory function to create a new pending Job
 */
export function createJob(params: { id: string; naturalKey: string; now: Date }): Job {
  return {
    id: params.id,
    naturalKey: params.naturalKey,
    status: 'pending',
    result: null,
    productId: null,
    error: null,
    createdAt: params.now,
    updatedAt: params.now,
  };
}
