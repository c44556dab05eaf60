import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Job, JobErrorPayload, JobStatus } from '../../domain/entities/Job.js';
import { isJobStatus } from '../../domain/entities/Job.js';
import type { JobListFilter, JobStore, JobTransition } from '../../domain/ports/JobStore.js';
import { DatabaseError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  natural_key: string;
  status: string;
  result: string | null;
  product_id: number | null;
  error: string | null;
  created_at: string;
  updated_at: string;
};

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

export class JobRepository implements JobStore {
  constructor(private db: DatabaseAdapter) {}

  async create(job: Job): Promise<void> {
    const sql = `
      INSERT INTO jobs (
        id, natural_key, status, result, product_id, error, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      job.naturalKey,
      job.status,
      job.result,
      job.productId,
      job.error ? JSON.stringify(job.error) : null,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
    ]);

    logger.debug('Job row inserted', { jobId: job.id, status: job.status });
  }

  async getById(jobId: string): Promise<Job | null> {
    const sql = `
      SELECT * FROM jobs
      WHERE id = ?
    `;

    const row = this.db.queryOne<JobRow>(sql, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  /**
   * Conditional update: only applies while the row is still in `from`.
   * Fields left undefined keep their stored value.
   */
  async transition(change: JobTransition): Promise<boolean> {
    const sql = `
      UPDATE jobs
      SET status = ?,
          updated_at = ?,
          result = COALESCE(?, result),
          product_id = COALESCE(?, product_id),
          error = COALESCE(?, error)
      WHERE id = ? AND status = ?
    `;

    const { changes } = this.db.execute(sql, [
      change.to,
      change.updatedAt.toISOString(),
      change.result ?? null,
      change.productId ?? null,
      change.error ? JSON.stringify(change.error) : null,
      change.jobId,
      change.from,
    ]);

    logger.debug('Job status update applied', {
      jobId: change.jobId,
      from: change.from,
      to: change.to,
      applied: changes > 0,
    });
    return changes > 0;
  }

  async list(filter: JobListFilter): Promise<Job[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.status) {
      conditions.push('status = ?');
      values.push(filter.status);
    }

    if (filter.naturalKey) {
      conditions.push('natural_key = ?');
      values.push(filter.naturalKey);
    }

    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const sql = `
      SELECT * FROM jobs
      ${where}
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `;

    const rows = this.db.query<JobRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  async listByStatus(status: JobStatus, options: { updatedBefore?: Date } = {}): Promise<Job[]> {
    const values: unknown[] = [status];
    let sql = 'SELECT * FROM jobs WHERE status = ?';
    if (options.updatedBefore) {
      sql += ' AND updated_at < ?';
      values.push(options.updatedBefore.toISOString());
    }
    sql += ' ORDER BY updated_at ASC, rowid ASC';

    const rows = this.db.query<JobRow>(sql, values);
    return rows.map((row) => this.mapRowToJob(row));
  }

  private mapRowToJob(row: JobRow): Job {
    if (!isJobStatus(row.status)) {
      throw new DatabaseError(`Unknown job status in row ${row.id}`, { status: row.status });
    }

    return {
      id: row.id,
      naturalKey: row.natural_key,
      status: row.status,
      result: row.result,
      productId: row.product_id,
      error: row.error ? this.parseError(row.error) : null,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private parseError(raw: string): JobErrorPayload {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) {
      return { code: 'UNKNOWN', message: raw, attempts: 0 };
    }
    const code = 'code' in parsed && typeof parsed.code === 'string' ? parsed.code : 'UNKNOWN';
    const message = 'message' in parsed && typeof parsed.message === 'string' ? parsed.message : raw;
    const attempts = 'attempts' in parsed && typeof parsed.attempts === 'number' ? parsed.attempts : 0;
    return { code, message, attempts };
  }
}
