import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './index.js';
import { createErrorHandler, notFoundHandler } from './errorHandler.js';
import { logger } from '../infra/logger.js';
import { toErrorMessage } from '../domain/errors.js';
import type { Env } from '../infra/env.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { ProductQueryService } from '../services/ProductQueryService.js';

export type AppDeps = {
  env: Pick<Env, 'NODE_ENV'>;
  jobOrchestrator: JobOrchestrator;
  productQueryService: ProductQueryService;
  /** Resolves true when every backing store answers. */
  readiness: () => Promise<boolean>;
};

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', async (_req: Request, res: Response) => {
    try {
      const ready = await deps.readiness();
      if (!ready) {
        res.status(503).json({ status: 'not-ready' });
        return;
      }
      res.json({ status: 'ready' });
    } catch (error) {
      logger.warn('Readiness check failed', { error: toErrorMessage(error) });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use(
    '/api',
    createApiRouter({
      jobOrchestrator: deps.jobOrchestrator,
      productQueryService: deps.productQueryService,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
