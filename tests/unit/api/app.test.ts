import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../../../src/api/app.js';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { ProductRepository } from '../../../src/infra/repositories/ProductRepository.js';
import { InMemoryJobQueue } from '../../../src/infra/queue/InMemoryJobQueue.js';
import { JobService } from '../../../src/services/JobService.js';
import { IngestionDecider } from '../../../src/services/IngestionDecider.js';
import { JobOrchestrator } from '../../../src/services/JobOrchestrator.js';
import { ProductQueryService } from '../../../src/services/ProductQueryService.js';
import { InMemoryHistoryStore, mutableClock, sampleProduct } from '../../helpers/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/infra/logger.js')>()),
  ...loggerMock,
}));

describe('HTTP API', () => {
  let db: DatabaseAdapter;
  let queue: InMemoryJobQueue;
  let orchestrator: JobOrchestrator;
  let server: Server;
  let baseUrl: string;
  let ready: boolean;

  beforeEach(async () => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    const clock = mutableClock('2024-06-10T15:00:00.000Z');
    const products = new ProductRepository(db);
    const history = new InMemoryHistoryStore();
    queue = new InMemoryJobQueue();
    let seq = 0;
    const jobService = new JobService(new JobRepository(db), clock, () => `job-${++seq}`);
    orchestrator = new JobOrchestrator(
      jobService,
      queue,
      { fetch: async () => sampleProduct() },
      new IngestionDecider(products, history, 'America/Halifax', clock),
      { maxAttempts: 3, initialDelayMs: 0, backoffFactor: 2 },
      async () => undefined
    );
    ready = true;

    const app = createApp({
      env: { NODE_ENV: 'test' },
      jobOrchestrator: orchestrator,
      productQueryService: new ProductQueryService(products, history),
      readiness: async () => ready,
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    db.close();
  });

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });

  async function runQueuedJob(): Promise<void> {
    const unit = await queue.dequeue();
    if (!unit) throw new Error('expected a queued unit');
    await orchestrator.executeJob(unit);
  }

  it('accepts a job submission with 202 and queues it', async () => {
    const res = await post('/api/jobs', JSON.stringify({ naturalKey: 'WC-1001' }));

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({
      job: {
        id: 'job-1',
        naturalKey: 'WC-1001',
        status: 'pending',
        result: null,
        productId: null,
        error: null,
        createdAt: '2024-06-10T15:00:00.000Z',
        updatedAt: '2024-06-10T15:00:00.000Z',
      },
    });
    expect(queue.size()).toBe(1);
  });

  it('rejects a submission without a natural key', async () => {
    const res = await post('/api/jobs', JSON.stringify({}));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'INVALID_INPUT',
      message: 'Invalid body',
      details: { issues: ['naturalKey: Required'] },
    });
    expect(queue.size()).toBe(0);
  });

  it('rejects malformed JSON', async () => {
    const res = await post('/api/jobs', '{"naturalKey":');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'INVALID_JSON', message: 'Invalid JSON in request body' });
  });

  it('reports job status and the parsed result once the job has run', async () => {
    await post('/api/jobs', JSON.stringify({ naturalKey: 'WC-1001' }));
    await runQueuedJob();

    const res = await fetch(`${baseUrl}/api/jobs/job-1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      job: {
        id: 'job-1',
        status: 'completed',
        productId: 1,
        result: { outcome: 'inserted', productId: 1, naturalKey: 'WC-1001', price: 59999, save: 5000 },
      },
    });
  });

  it('returns 404 for an unknown job', async () => {
    const res = await fetch(`${baseUrl}/api/jobs/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'NOT_FOUND',
      message: 'Job with id nope not found',
      details: { resource: 'Job', id: 'nope' },
    });
  });

  it('lists jobs filtered by status', async () => {
    await post('/api/jobs', JSON.stringify({ naturalKey: 'WC-1001' }));
    await post('/api/jobs', JSON.stringify({ naturalKey: 'WC-2002' }));
    await runQueuedJob();

    const pending = await fetch(`${baseUrl}/api/jobs?status=pending`);
    expect(await pending.json()).toMatchObject({ jobs: [{ id: 'job-2', status: 'pending' }] });

    const invalid = await fetch(`${baseUrl}/api/jobs?status=bogus`);
    expect(invalid.status).toBe(400);
  });

  it('serves products and their price history', async () => {
    await post('/api/jobs', JSON.stringify({ naturalKey: 'WC-1001' }));
    await runQueuedJob();

    const list = await fetch(`${baseUrl}/api/products`);
    expect(await list.json()).toMatchObject({ total: 1, page: 1, pageSize: 20, items: [{ naturalKey: 'WC-1001' }] });

    const one = await fetch(`${baseUrl}/api/products/WC-1001`);
    expect(await one.json()).toMatchObject({
      product: { id: 1, naturalKey: 'WC-1001', price: 59999, model: 'KSM150' },
    });

    const history = await (await fetch(`${baseUrl}/api/products/WC-1001/history?limit=5`)).json();
    expect(history).toEqual({
      entries: [{ naturalKey: 'WC-1001', price: 59999, save: 5000, observedAt: '2024-06-10T15:00:00.000Z' }],
    });

    const missing = await fetch(`${baseUrl}/api/products/WC-404`);
    expect(missing.status).toBe(404);

    const badPage = await fetch(`${baseUrl}/api/products?pageSize=500`);
    expect(badPage.status).toBe(400);
  });

  it('answers the health and readiness checks', async () => {
    const health = await fetch(`${baseUrl}/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'ok' });

    expect((await fetch(`${baseUrl}/ready`)).status).toBe(200);
    ready = false;
    const notReady = await fetch(`${baseUrl}/ready`);
    expect(notReady.status).toBe(503);
    expect(await notReady.json()).toEqual({ status: 'not-ready' });
  });

  it('returns 404 JSON for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/nowhere`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'NOT_FOUND', message: 'The requested resource was not found' });
  });
});
