import type { Job } from '../domain/entities/Job.js';
import type { PriceHistoryEntry, Product } from '../domain/entities/Product.js';

/**
 * `result` is stored as a JSON string; it is returned parsed.
 */
export function mapJobToResponse(job: Job) {
  return {
    id: job.id,
    naturalKey: job.naturalKey,
    status: job.status,
    result: job.result ? parseResult(job.result) : null,
    productId: job.productId,
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}

export function mapProductToResponse(product: Product) {
  return {
    id: product.id,
    naturalKey: product.naturalKey,
    title: product.title,
    model: product.model,
    url: product.url,
    price: product.price,
    save: product.save,
    createdAt: product.createdAt.toISOString(),
    updatedAt: product.updatedAt.toISOString(),
  };
}

export function mapHistoryEntryToResponse(entry: PriceHistoryEntry) {
  return {
    naturalKey: entry.naturalKey,
    price: entry.price,
    save: entry.save,
    observedAt: entry.observedAt.toISOString(),
  };
}

function parseResult(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
