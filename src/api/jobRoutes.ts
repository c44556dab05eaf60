import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import { JOB_STATUSES } from '../domain/entities/Job.js';
import { mapJobToResponse } from './jobMapper.js';
import { parseRequest } from './validation.js';

const submitBodySchema = z.object({
  naturalKey: z.string().trim().min(1, 'naturalKey must be a non-empty string'),
});

const listQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  naturalKey: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

/**
 * Jobs route handler
 */
export function createJobRouter(jobOrchestrator: JobOrchestrator): Router {
  const router = Router();

  /**
   * POST /api/jobs
   * Accepted, not done: the job runs on a worker.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { naturalKey } = parseRequest(submitBodySchema, req.body ?? {}, 'body');
      const job = await jobOrchestrator.submit(naturalKey);
      res.status(202).json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs?status=...&naturalKey=...&limit=...
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = parseRequest(listQuerySchema, req.query, 'query');
      const jobs = await jobOrchestrator.listJobs(filter);
      res.json({ jobs: jobs.map(mapJobToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobOrchestrator.getJob(req.params.jobId);
      res.json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
