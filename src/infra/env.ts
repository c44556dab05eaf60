import { z, type ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';
import { isValidTimeZone } from '../domain/clock.js';

/**
 * Environment variable schema with strict validation.
 * Parsed once at startup; the resulting Env is passed to every component.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Relational store (jobs, products)
  SQLITE_DB_PATH: z.string().min(1).default('./data/price-ingest.db'),

  // Document store (price history)
  MONGO_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGO_DB_NAME: z.string().min(1).default('price_ingest'),
  MONGO_HISTORY_COLLECTION: z.string().min(1).default('price_history'),

  // Extraction source
  EXTRACTOR_BASE_URL: z.string().url(),
  EXTRACTOR_API_KEY: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().optional()
  ),
  EXTRACTOR_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),

  // Calendar used by the same-day check
  TIMEZONE: z
    .string()
    .default('America/Halifax')
    .refine(isValidTimeZone, { message: 'TIMEZONE must be a valid IANA time zone' }),

  // Workers and retries
  WORKER_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'WORKER_CONCURRENCY must be at least 1' })
    .max(64)
    .default(2),
  JOB_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'JOB_MAX_ATTEMPTS must be at least 1' })
    .max(10)
    .default(3),
  JOB_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  JOB_BACKOFF_FACTOR: z.coerce
    .number()
    .min(1, { message: 'JOB_BACKOFF_FACTOR must be at least 1' })
    .default(2),

  // Stuck job detection
  STUCK_JOB_THRESHOLD_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'STUCK_JOB_THRESHOLD_MINUTES must be at least 1' })
    .default(30),
  STUCK_JOB_CHECK_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'STUCK_JOB_CHECK_INTERVAL_MINUTES must be at least 1' })
    .max(59)
    .default(5),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.preprocess((value) => (value === '' ? undefined : value), z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parses an environment map, throwing a ConfigError that lists every issue
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError('Environment validation failed', { issues: formatIssues(result.error) });
  }
  return result.data;
}

/**
 * Validates process.env
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    formatIssues(result.error).forEach((issue) => {
      console.error(`  - ${issue}`);
    });
    console.error('\nCheck .env.example for required variables');
    process.exit(1);
  }
  return result.data;
}
