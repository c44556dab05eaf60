import type { PriceHistoryEntry } from '../entities/Product.js';

/**
 * Append-only price ledger
 */
export interface HistoryStore {
  append(entry: PriceHistoryEntry): Promise<void>;
  listByNaturalKey(naturalKey: string, options?: { since?: Date; limit?: number }): Promise<PriceHistoryEntry[]>;
}
