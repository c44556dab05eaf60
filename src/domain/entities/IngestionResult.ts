export type IngestionOutcome =
  | 'inserted'
  | 'updated_today'
  | 'updated_changed'
  | 'no_action_same_day_unchanged';

export interface IngestionResult {
  productId: number;
  outcome: IngestionOutcome;
}

/**
 * Shape stored in the job's result column once ingestion succeeds
 */
export interface JobResultPayload {
  outcome: IngestionOutcome;
  productId: number;
  naturalKey: string;
  price: number;
  save: number;
  observedAt: string;
}

export function serializeJobResult(payload: JobResultPayload): string {
  return JSON.stringify(payload);
}
