/**
 * Product entity - the normalized, persisted record for one natural key.
 * Prices are integer cents.
 */
export interface Product {
  id: number;
  naturalKey: string;
  title: string;
  model: string | null;
  url: string;
  price: number;
  save: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Extraction output, before it has a surrogate key
 */
export interface NormalizedProduct {
  naturalKey: string;
  title: string;
  model: string | null;
  url: string;
  price: number;
  save: number;
  observedAt: Date;
}

/**
 * One append-only observation of a product's price
 */
export interface PriceHistoryEntry {
  naturalKey: string;
  price: number;
  save: number;
  observedAt: Date;
}

export function createHistoryEntry(product: NormalizedProduct): PriceHistoryEntry {
  return {
    naturalKey: product.naturalKey,
    price: product.price,
    save: product.save,
    observedAt: product.observedAt,
  };
}
