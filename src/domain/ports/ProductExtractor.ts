import type { NormalizedProduct } from '../entities/Product.js';

/**
 * Source of product data. Resolves to null when the product does not exist;
 * rejects on transient faults (timeouts, upstream errors).
 */
export interface ProductExtractor {
  fetch(naturalKey: string): Promise<NormalizedProduct | null>;
}
