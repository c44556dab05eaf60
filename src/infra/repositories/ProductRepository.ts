import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { NormalizedProduct, Product } from '../../domain/entities/Product.js';
import type { ProductPage, ProductPriceUpdate, ProductStore } from '../../domain/ports/ProductStore.js';
import { logger } from '../logger.js';

type ProductRow = {
  id: number;
  natural_key: string;
  title: string;
  model: string | null;
  url: string;
  price: number;
  save: number;
  created_at: string;
  updated_at: string;
};

export class ProductRepository implements ProductStore {
  constructor(private db: DatabaseAdapter) {}

  async getByNaturalKey(naturalKey: string): Promise<Product | null> {
    const row = this.db.queryOne<ProductRow>('SELECT * FROM products WHERE natural_key = ?', [naturalKey]);
    return row ? this.mapRowToProduct(row) : null;
  }

  async insert(product: NormalizedProduct, now: Date): Promise<number> {
    const sql = `
      INSERT INTO products (natural_key, title, model, url, price, save, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `;

    const timestamp = now.toISOString();
    const { lastInsertRowid } = this.db.execute(sql, [
      product.naturalKey,
      product.title,
      product.model,
      product.url,
      product.price,
      product.save,
      timestamp,
      timestamp,
    ]);

    logger.debug('Product inserted', { productId: lastInsertRowid, naturalKey: product.naturalKey });
    return lastInsertRowid;
  }

  async updatePrice(update: ProductPriceUpdate): Promise<void> {
    const sql = `
      UPDATE products
      SET price = ?, save = ?, updated_at = ?
      WHERE natural_key = ?
    `;

    this.db.execute(sql, [update.price, update.save, update.updatedAt.toISOString(), update.naturalKey]);
    logger.debug('Product price updated', { naturalKey: update.naturalKey, price: update.price });
  }

  async remove(productId: number): Promise<void> {
    this.db.execute('DELETE FROM products WHERE id = ?', [productId]);
    logger.debug('Product removed', { productId });
  }

  async list(params: { offset: number; limit: number }): Promise<ProductPage> {
    const rows = this.db.query<ProductRow>('SELECT * FROM products ORDER BY id ASC LIMIT ? OFFSET ?', [
      params.limit,
      params.offset,
    ]);
    const count = this.db.queryOne<{ total: number }>('SELECT COUNT(*) AS total FROM products');

    return {
      items: rows.map((row) => this.mapRowToProduct(row)),
      total: count?.total ?? 0,
    };
  }

  private mapRowToProduct(row: ProductRow): Product {
    return {
      id: row.id,
      naturalKey: row.natural_key,
      title: row.title,
      model: row.model,
      url: row.url,
      price: row.price,
      save: row.save,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
