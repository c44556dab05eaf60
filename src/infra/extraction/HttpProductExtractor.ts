import { z } from 'zod';
import type { NormalizedProduct } from '../../domain/entities/Product.js';
import type { ProductExtractor } from '../../domain/ports/ProductExtractor.js';
import { normalizeRawProduct } from '../../domain/productNormalizer.js';
import { ExtractionError, toErrorMessage } from '../../domain/errors.js';
import type { Clock } from '../../domain/clock.js';
import { systemClock } from '../../domain/clock.js';
import type { Env } from '../env.js';
import { logger } from '../logger.js';

const amountSchema = z.union([z.string(), z.number()]).nullish();

/**
 * Wire shape served by the extraction endpoint
 */
const rawProductSchema = z.object({
  web_code: z.string().nullish(),
  title: z.string().nullish(),
  model: z.string().nullish(),
  url: z.string().nullish(),
  price: amountSchema,
  save: amountSchema,
  date: z.string().nullish(),
});

/**
 * Fetches one product as JSON from the configured extraction endpoint:
 *   GET {EXTRACTOR_BASE_URL}/products/{naturalKey}
 * 404 means the product does not exist (null); anything else that is not
 * a 2xx JSON object raises ExtractionError. No retries here: callers wrap
 * this in the backoff executor.
 */
export class HttpProductExtractor implements ProductExtractor {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(
    env: Pick<Env, 'EXTRACTOR_BASE_URL' | 'EXTRACTOR_API_KEY' | 'EXTRACTOR_TIMEOUT_MS'>,
    private readonly clock: Clock = systemClock
  ) {
    this.baseUrl = env.EXTRACTOR_BASE_URL;
    this.apiKey = env.EXTRACTOR_API_KEY;
    this.timeoutMs = env.EXTRACTOR_TIMEOUT_MS;
  }

  buildUrl(naturalKey: string): string {
    const url = new URL(this.baseUrl);
    const basePath = url.pathname.endsWith('/') ? url.pathname : `${url.pathname}/`;
    url.pathname = `${basePath}products/${encodeURIComponent(naturalKey)}`;
    return url.toString();
  }

  /**
   * The abort timer covers the whole exchange, body read included.
   */
  async fetch(naturalKey: string): Promise<NormalizedProduct | null> {
    const requestUrl = this.buildUrl(naturalKey);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.request(naturalKey, requestUrl, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ExtractionError(
          `Extraction request timed out after ${this.timeoutMs}ms`,
          { naturalKey, url: requestUrl, timeout: true },
          error
        );
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async request(naturalKey: string, requestUrl: string, signal: AbortSignal): Promise<NormalizedProduct | null> {
    let res: Response;
    try {
      res = await fetch(requestUrl, {
        headers: {
          Accept: 'application/json',
          ...(this.apiKey ? { 'X-API-Key': this.apiKey } : {}),
        },
        signal,
      });
    } catch (error) {
      throw new ExtractionError('Extraction request failed', { naturalKey, url: requestUrl }, error);
    }

    if (res.status === 404) {
      await res.text().catch(() => '');
      logger.info('Product not found at extraction source', { naturalKey });
      return null;
    }

    if (!res.ok) {
      await res.text().catch(() => '');
      throw new ExtractionError(`Extraction request failed: ${res.status}`, {
        naturalKey,
        url: requestUrl,
        status: res.status,
      });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new ExtractionError('Extraction response is not valid JSON', { naturalKey }, error);
    }

    const parsed = rawProductSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExtractionError('Extraction response has an unexpected shape', {
        naturalKey,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    try {
      return normalizeRawProduct(parsed.data, { requestedNaturalKey: naturalKey, now: this.clock() });
    } catch (error) {
      logger.warn('Extracted product rejected', { naturalKey, error: toErrorMessage(error) });
      throw error;
    }
  }
}
