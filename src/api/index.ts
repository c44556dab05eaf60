import { Router } from 'express';
import { createJobRouter } from './jobRoutes.js';
import { createProductRouter } from './productRoutes.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { ProductQueryService } from '../services/ProductQueryService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from server.ts
 */
export function createApiRouter(deps: {
  jobOrchestrator: JobOrchestrator;
  productQueryService: ProductQueryService;
}): Router {
  const router = Router();

  router.use('/jobs', createJobRouter(deps.jobOrchestrator));
  router.use('/products', createProductRouter(deps.productQueryService));

  return router;
}
