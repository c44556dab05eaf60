import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpProductExtractor } from '../../../src/infra/extraction/HttpProductExtractor.js';
import { ExtractionError, ValidationError } from '../../../src/domain/errors.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const env = {
  EXTRACTOR_BASE_URL: 'http://extractor.test/api',
  EXTRACTOR_API_KEY: 'test-secret',
  EXTRACTOR_TIMEOUT_MS: 100,
};

const fixedNow = new Date('2024-06-10T15:00:00.000Z');
const clock = () => fixedNow;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HttpProductExtractor', () => {
  const fetchMock = vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => jsonResponse({}));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the product URL under the base path', () => {
    expect(new HttpProductExtractor(env, clock).buildUrl('WC 1001')).toBe(
      'http://extractor.test/api/products/WC%201001'
    );
    expect(
      new HttpProductExtractor({ ...env, EXTRACTOR_BASE_URL: 'http://extractor.test' }, clock).buildUrl('WC-1001')
    ).toBe('http://extractor.test/products/WC-1001');
  });

  it('normalizes a product payload', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        web_code: 'Web Code: WC-1001',
        title: ' Stand Mixer ',
        model: 'Model: KSM150',
        url: 'https://shop.example/p/WC-1001',
        price: '$599.99',
        save: '$50.00',
        date: '2024-06-09T12:00:00.000Z',
      })
    );

    const product = await new HttpProductExtractor(env, clock).fetch('WC-1001');

    expect(product).toEqual({
      naturalKey: 'WC-1001',
      title: 'Stand Mixer',
      model: 'KSM150',
      url: 'https://shop.example/p/WC-1001',
      price: 59999,
      save: 5000,
      observedAt: new Date('2024-06-09T12:00:00.000Z'),
    });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://extractor.test/api/products/WC-1001',
      expect.objectContaining({
        headers: { Accept: 'application/json', 'X-API-Key': 'test-secret' },
      })
    );
  });

  it('falls back to the requested key and the clock when fields are missing', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ title: 'Kettle', url: 'https://shop.example/k', price: 25 }));

    const product = await new HttpProductExtractor({ ...env, EXTRACTOR_API_KEY: undefined }, clock).fetch('WC-77');

    expect(product).toEqual({
      naturalKey: 'WC-77',
      title: 'Kettle',
      model: null,
      url: 'https://shop.example/k',
      price: 2500,
      save: 0,
      observedAt: fixedNow,
    });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://extractor.test/api/products/WC-77',
      expect.objectContaining({ headers: { Accept: 'application/json' } })
    );
  });

  it('returns null when the source has no such product', async () => {
    fetchMock.mockResolvedValueOnce(new Response('not found', { status: 404 }));

    await expect(new HttpProductExtractor(env, clock).fetch('WC-404')).resolves.toBeNull();
  });

  it('raises ExtractionError on an error status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

    await expect(new HttpProductExtractor(env, clock).fetch('WC-1001')).rejects.toThrow(
      'Extraction request failed: 503'
    );
  });

  it('raises ExtractionError on a body that is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html></html>', { status: 200 }));

    await expect(new HttpProductExtractor(env, clock).fetch('WC-1001')).rejects.toThrow(
      'Extraction response is not valid JSON'
    );
  });

  it('raises ExtractionError on an unexpected payload shape', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ title: 42 }));

    await expect(new HttpProductExtractor(env, clock).fetch('WC-1001')).rejects.toThrow(
      'Extraction response has an unexpected shape'
    );
  });

  it('wraps network failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const attempt = new HttpProductExtractor(env, clock).fetch('WC-1001');
    await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
    await expect(attempt).rejects.toThrow('Extraction request failed');
  });

  it('aborts a request that outlives the timeout', async () => {
    fetchMock.mockImplementationOnce(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(new HttpProductExtractor(env, clock).fetch('WC-1001')).rejects.toThrow(
      'Extraction request timed out after 100ms'
    );
  });

  it('keeps the timeout running while the body is read', async () => {
    fetchMock.mockImplementationOnce(async (_input: string, init?: RequestInit) => {
      const body = new ReadableStream<Uint8Array>({
        start(stream) {
          stream.enqueue(new TextEncoder().encode('{"title":'));
          init?.signal?.addEventListener('abort', () => stream.error(new Error('aborted')));
        },
      });
      return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
    });

    const attempt = new HttpProductExtractor(env, clock).fetch('WC-1001');
    await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
    await expect(attempt).rejects.toThrow('Extraction request timed out after 100ms');
  });

  it('rejects a payload for a different product as invalid input', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ web_code: 'Web Code: WC-2002', title: 'Kettle', url: 'https://shop.example/k', price: '$25' })
    );

    const attempt = new HttpProductExtractor(env, clock).fetch('WC-1001');
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow('Extracted web code does not match the requested key');
    expect(loggerMock.logger.warn).toHaveBeenCalledWith('Extracted product rejected', {
      naturalKey: 'WC-1001',
      error: 'Extracted web code does not match the requested key',
    });
  });
});
