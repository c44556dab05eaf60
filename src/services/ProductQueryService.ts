import type { Product, PriceHistoryEntry } from '../domain/entities/Product.js';
import type { ProductStore } from '../domain/ports/ProductStore.js';
import type { HistoryStore } from '../domain/ports/HistoryStore.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type ProductListPage = {
  items: Product[];
  total: number;
  page: number;
  pageSize: number;
};

/**
 * Read side over products and their price history
 */
export class ProductQueryService {
  constructor(
    private productStore: ProductStore,
    private historyStore: HistoryStore
  ) {}

  async listProducts(params: { page?: number; pageSize?: number } = {}): Promise<ProductListPage> {
    const page = params.page ?? 1;
    const pageSize = params.pageSize ?? DEFAULT_PAGE_SIZE;

    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be an integer >= 1', { page });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`pageSize must be an integer in 1..${MAX_PAGE_SIZE}`, { pageSize });
    }

    const { items, total } = await this.productStore.list({ offset: (page - 1) * pageSize, limit: pageSize });
    return { items, total, page, pageSize };
  }

  async getProduct(naturalKey: string): Promise<Product> {
    const product = await this.productStore.getByNaturalKey(naturalKey);
    if (!product) {
      throw new NotFoundError('Product', naturalKey);
    }
    return product;
  }

  /**
   * Newest observation first. Unknown products are a 404 rather than an empty ledger.
   */
  async getHistory(naturalKey: string, options: { since?: Date; limit?: number } = {}): Promise<PriceHistoryEntry[]> {
    await this.getProduct(naturalKey);
    return this.historyStore.listByNaturalKey(naturalKey, options);
  }
}
