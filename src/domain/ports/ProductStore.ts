import type { NormalizedProduct, Product } from '../entities/Product.js';

export type ProductPriceUpdate = {
  naturalKey: string;
  price: number;
  save: number;
  updatedAt: Date;
};

export type ProductPage = {
  items: Product[];
  total: number;
};

export interface ProductStore {
  getByNaturalKey(naturalKey: string): Promise<Product | null>;
  /** Inserts a new product and resolves to its surrogate key. */
  insert(product: NormalizedProduct, now: Date): Promise<number>;
  /** Rewrites price fields and the last-modified timestamp only. */
  updatePrice(update: ProductPriceUpdate): Promise<void>;
  /** Deletes a product by surrogate key; used to roll back an insert. */
  remove(productId: number): Promise<void>;
  list(params: { offset: number; limit: number }): Promise<ProductPage>;
}
