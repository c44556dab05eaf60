import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ProductQueryService } from '../services/ProductQueryService.js';
import { MAX_PAGE_SIZE } from '../services/ProductQueryService.js';
import { MAX_HISTORY_LIMIT } from '../infra/mongo/MongoHistoryRepository.js';
import { mapHistoryEntryToResponse, mapProductToResponse } from './jobMapper.js';
import { parseRequest } from './validation.js';

const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).optional(),
  since: z.coerce.date().optional(),
});

/**
 * Products route handler (read only; writes happen through jobs)
 */
export function createProductRouter(productQueryService: ProductQueryService): Router {
  const router = Router();

  /**
   * GET /api/products?page=1&pageSize=20
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(listQuerySchema, req.query, 'query');
      const page = await productQueryService.listProducts(query);
      res.json({ ...page, items: page.items.map(mapProductToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/products/:naturalKey
   */
  router.get('/:naturalKey', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await productQueryService.getProduct(req.params.naturalKey);
      res.json({ product: mapProductToResponse(product) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/products/:naturalKey/history?limit=50&since=2024-01-01
   */
  router.get('/:naturalKey/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(historyQuerySchema, req.query, 'query');
      const entries = await productQueryService.getHistory(req.params.naturalKey, query);
      res.json({ entries: entries.map(mapHistoryEntryToResponse) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
