import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { JobRepository } from './infra/repositories/JobRepository.js';
import { ProductRepository } from './infra/repositories/ProductRepository.js';
import { MongoHistoryRepository } from './infra/mongo/MongoHistoryRepository.js';
import { HttpProductExtractor } from './infra/extraction/HttpProductExtractor.js';
import { InMemoryJobQueue } from './infra/queue/InMemoryJobQueue.js';
import { IngestionDecider } from './services/IngestionDecider.js';
import { JobService } from './services/JobService.js';
import { JobOrchestrator, retryPolicyFromEnv } from './services/JobOrchestrator.js';
import { ProductQueryService } from './services/ProductQueryService.js';
import { StuckJobMonitor } from './services/StuckJobMonitor.js';
import { WorkerPool } from './services/WorkerPool.js';
import { StuckJobScheduler } from './scheduler/StuckJobScheduler.js';
import { createApp } from './api/app.js';
import { toErrorMessage } from './domain/errors.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Infrastructure adapters
const db = new DatabaseAdapter(env);
const jobRepo = new JobRepository(db);
const productRepo = new ProductRepository(db);
const historyRepo = new MongoHistoryRepository(env.MONGO_URI, env.MONGO_DB_NAME, env.MONGO_HISTORY_COLLECTION);
const extractor = new HttpProductExtractor(env);
const queue = new InMemoryJobQueue();

// Services
const jobService = new JobService(jobRepo);
const decider = new IngestionDecider(productRepo, historyRepo, env.TIMEZONE);
const jobOrchestrator = new JobOrchestrator(jobService, queue, extractor, decider, retryPolicyFromEnv(env));
const productQueryService = new ProductQueryService(productRepo, historyRepo);
const workerPool = new WorkerPool(queue, (unit) => jobOrchestrator.executeJob(unit), {
  concurrency: env.WORKER_CONCURRENCY,
});
const stuckJobScheduler = new StuckJobScheduler(
  new StuckJobMonitor(jobService, env.STUCK_JOB_THRESHOLD_MINUTES),
  env.STUCK_JOB_CHECK_INTERVAL_MINUTES
);

const app = createApp({
  env,
  jobOrchestrator,
  productQueryService,
  readiness: async () => {
    db.queryOne('SELECT 1 as ok');
    await historyRepo.ping();
    return true;
  },
});

// Jobs accepted before a restart were only in the dropped in-process queue
await jobOrchestrator.requeuePendingJobs();
workerPool.start();

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    workers: env.WORKER_CONCURRENCY,
  });
  stuckJobScheduler.start();
});

async function shutdown(signal: string): Promise<void> {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  stuckJobScheduler.stop();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await workerPool.stop();
  await historyRepo.close();
  db.close();
  loggerInstance.info('Server closed');
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        loggerInstance.error('Shutdown failed', { error: toErrorMessage(error) });
        process.exit(1);
      }
    );
  });
}

export { app };
