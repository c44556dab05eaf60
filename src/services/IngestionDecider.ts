import { z } from 'zod';
import type { NormalizedProduct, Product } from '../domain/entities/Product.js';
import { createHistoryEntry } from '../domain/entities/Product.js';
import type { IngestionOutcome, IngestionResult } from '../domain/entities/IngestionResult.js';
import type { ProductStore } from '../domain/ports/ProductStore.js';
import type { HistoryStore } from '../domain/ports/HistoryStore.js';
import type { Clock } from '../domain/clock.js';
import { isSameCalendarDate, systemClock } from '../domain/clock.js';
import { IngestionError, ValidationError, toErrorMessage } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

const centsSchema = z.number().int().nonnegative();

const normalizedProductSchema = z.object({
  naturalKey: z.string().trim().min(1),
  title: z.string().trim().min(1),
  model: z.string().nullable(),
  url: z.string().trim().min(1),
  price: centsSchema,
  save: centsSchema,
  observedAt: z.date().refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid date' }),
});

export function assertValidProduct(product: NormalizedProduct): void {
  const result = normalizedProductSchema.safeParse(product);
  if (!result.success) {
    throw new ValidationError('Normalized product is missing required fields', {
      naturalKey: typeof product.naturalKey === 'string' ? product.naturalKey : null,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
}

type Decision =
  | { action: 'insert' }
  | { action: 'update'; existing: Product; outcome: Extract<IngestionOutcome, 'updated_changed' | 'updated_today'> }
  | { action: 'none'; existing: Product };

/**
 * Pure insert/update/no-op choice for one candidate against the stored product
 */
export function decideIngestion(
  existing: Product | null,
  candidate: NormalizedProduct,
  now: Date,
  timeZone: string
): Decision {
  if (!existing) {
    return { action: 'insert' };
  }
  if (existing.price !== candidate.price) {
    return { action: 'update', existing, outcome: 'updated_changed' };
  }
  if (isSameCalendarDate(existing.updatedAt, now, timeZone)) {
    return { action: 'none', existing };
  }
  return { action: 'update', existing, outcome: 'updated_today' };
}

/**
 * IngestionDecider - owns every product and price-history write.
 *
 * Re-ingesting an unchanged price on the same calendar day is a no-op, so a
 * retried or resubmitted job never appends a second history entry that day.
 * The product write always precedes the history append; a failed product
 * write leaves the ledger untouched, and a failed append undoes the product
 * write.
 */
export class IngestionDecider {
  constructor(
    private productStore: ProductStore,
    private historyStore: HistoryStore,
    private timeZone: string,
    private clock: Clock = systemClock
  ) {}

  async ingest(product: NormalizedProduct): Promise<IngestionResult> {
    assertValidProduct(product);
    const now = this.clock();

    const existing = await this.guard('lookup', product.naturalKey, () =>
      this.productStore.getByNaturalKey(product.naturalKey)
    );
    const decision = decideIngestion(existing, product, now, this.timeZone);

    if (decision.action === 'insert') {
      const productId = await this.guard('insert', product.naturalKey, () => this.productStore.insert(product, now));
      await this.appendHistory(product, () => this.productStore.remove(productId));
      logger.info('Product inserted', { naturalKey: product.naturalKey, productId, price: product.price });
      return { productId, outcome: 'inserted' };
    }

    const { existing: stored } = decision;
    if (decision.action === 'none') {
      logger.info('Product unchanged today, no write', { naturalKey: product.naturalKey, productId: stored.id });
      return { productId: stored.id, outcome: 'no_action_same_day_unchanged' };
    }

    await this.guard('update', product.naturalKey, () =>
      this.productStore.updatePrice({
        naturalKey: product.naturalKey,
        price: product.price,
        save: product.save,
        updatedAt: now,
      })
    );
    await this.appendHistory(product, () =>
      this.productStore.updatePrice({
        naturalKey: stored.naturalKey,
        price: stored.price,
        save: stored.save,
        updatedAt: stored.updatedAt,
      })
    );
    logger.info('Product updated', {
      naturalKey: product.naturalKey,
      productId: stored.id,
      outcome: decision.outcome,
      previousPrice: stored.price,
      price: product.price,
    });
    return { productId: stored.id, outcome: decision.outcome };
  }

  /**
   * Appends the ledger entry, undoing the product write if the append fails
   * so a retry takes the same insert/update path again.
   */
  private async appendHistory(product: NormalizedProduct, undoProductWrite: () => Promise<void>): Promise<void> {
    try {
      await this.historyStore.append(createHistoryEntry(product));
    } catch (error) {
      logger.error('Ingestion storage step failed', {
        step: 'history append',
        naturalKey: product.naturalKey,
        error: toErrorMessage(error),
      });
      await this.rollback(product.naturalKey, undoProductWrite);
      throw new IngestionError(
        `Product history append failed for ${product.naturalKey}: ${toErrorMessage(error)}`,
        { step: 'history append', naturalKey: product.naturalKey },
        error
      );
    }
  }

  private async rollback(naturalKey: string, undo: () => Promise<void>): Promise<void> {
    try {
      await undo();
      logger.warn('Product write rolled back after history failure', { naturalKey });
    } catch (error) {
      logger.error('Product rollback failed; product and history may disagree', {
        naturalKey,
        error: toErrorMessage(error),
      });
    }
  }

  private async guard<T>(step: string, naturalKey: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error('Ingestion storage step failed', { step, naturalKey, error: toErrorMessage(error) });
      throw new IngestionError(`Product ${step} failed for ${naturalKey}: ${toErrorMessage(error)}`, { step, naturalKey }, error);
    }
  }
}
