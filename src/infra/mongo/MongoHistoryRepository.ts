import { MongoClient, type Collection, type Filter } from 'mongodb';
import type { PriceHistoryEntry } from '../../domain/entities/Product.js';
import type { HistoryStore } from '../../domain/ports/HistoryStore.js';
import { toErrorMessage } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { mongoIndexes } from './mongo.indexes.js';

export type PriceHistoryDocument = {
  naturalKey: string;
  price: number;
  save: number;
  observedAt: Date;
};

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 500;

export const clampHistoryLimit = (limit: number | undefined): number =>
  Math.min(Math.max(Math.trunc(limit ?? DEFAULT_HISTORY_LIMIT), 1), MAX_HISTORY_LIMIT);

export const toHistoryDocument = (entry: PriceHistoryEntry): PriceHistoryDocument => ({
  naturalKey: entry.naturalKey,
  price: entry.price,
  save: entry.save,
  observedAt: entry.observedAt,
});

export const fromHistoryDocument = (doc: PriceHistoryDocument): PriceHistoryEntry => ({
  naturalKey: doc.naturalKey,
  price: doc.price,
  save: doc.save,
  observedAt: doc.observedAt,
});

export const buildHistoryFilter = (naturalKey: string, since?: Date): Filter<PriceHistoryDocument> =>
  since ? { naturalKey, observedAt: { $gte: since } } : { naturalKey };

/**
 * Append-only price ledger in a MongoDB collection.
 * Connects lazily on first use; concurrent callers share one connection attempt.
 */
export class MongoHistoryRepository implements HistoryStore {
  private client?: MongoClient;
  private ready?: Promise<Collection<PriceHistoryDocument>>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName: string,
    private readonly collectionName: string
  ) {}

  private getCollection(): Promise<Collection<PriceHistoryDocument>> {
    if (!this.ready) {
      this.ready = this.connect().catch((error: unknown) => {
        this.ready = undefined;
        throw error;
      });
    }
    return this.ready;
  }

  private async connect(): Promise<Collection<PriceHistoryDocument>> {
    const client = new MongoClient(this.mongoUri);
    try {
      await client.connect();
      const col = client.db(this.dbName).collection<PriceHistoryDocument>(this.collectionName);

      // Index creation is idempotent.
      for (const idx of mongoIndexes.priceHistory) {
        await col.createIndex(idx.keys, idx.options);
      }

      this.client = client;
      logger.info('Price history collection ready', { db: this.dbName, collection: this.collectionName });
      return col;
    } catch (error) {
      logger.error('Price history connection failed', { db: this.dbName, error: toErrorMessage(error) });
      await client.close().catch((closeError: unknown) => {
        logger.warn('Failed to close price history client', { error: toErrorMessage(closeError) });
      });
      throw error;
    }
  }

  async append(entry: PriceHistoryEntry): Promise<void> {
    const col = await this.getCollection();
    // insertOne mutates its argument with _id, so hand it a fresh object.
    await col.insertOne(toHistoryDocument(entry));
    logger.debug('Price history entry appended', { naturalKey: entry.naturalKey, price: entry.price });
  }

  async listByNaturalKey(
    naturalKey: string,
    options: { since?: Date; limit?: number } = {}
  ): Promise<PriceHistoryEntry[]> {
    const col = await this.getCollection();
    const docs = await col
      .find(buildHistoryFilter(naturalKey, options.since), { projection: { _id: 0 } })
      .sort({ observedAt: -1 })
      .limit(clampHistoryLimit(options.limit))
      .toArray();
    return docs.map(fromHistoryDocument);
  }

  async ping(): Promise<void> {
    const col = await this.getCollection();
    await col.estimatedDocumentCount();
  }

  async close(): Promise<void> {
    const pending = this.ready;
    this.ready = undefined;
    if (pending) {
      // A failed connect has already closed its own client.
      await pending.catch(() => undefined);
    }
    const client = this.client;
    this.client = undefined;
    await client?.close();
  }
}
