import { describe, expect, it, vi } from 'vitest';
import { backoffDelayMs, executeWithBackoff } from '../../../src/services/BackoffExecutor.js';
import { ExtractionError, ValidationError, isRetryableError } from '../../../src/domain/errors.js';

const policy = { maxAttempts: 3, initialDelayMs: 5000, backoffFactor: 2 };

function sleeper() {
  return vi.fn(async (_ms: number) => undefined);
}

describe('backoffDelayMs', () => {
  it('grows geometrically from the initial delay', () => {
    expect(backoffDelayMs(1, 5000, 2)).toBe(5000);
    expect(backoffDelayMs(2, 5000, 2)).toBe(10000);
    expect(backoffDelayMs(3, 5000, 2)).toBe(20000);
  });

  it('stays constant with a factor of 1', () => {
    expect(backoffDelayMs(4, 250, 1)).toBe(250);
  });
});

describe('executeWithBackoff', () => {
  it('returns the first non-empty result without sleeping', async () => {
    const sleep = sleeper();
    const operation = vi.fn(async () => 'ok');

    await expect(executeWithBackoff(operation, { ...policy, retryOnEmptyResult: true, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps 5000 then 10000 ms and rethrows the last fault after three failed attempts', async () => {
    const sleep = sleeper();
    let calls = 0;
    const operation = vi.fn(async (): Promise<string> => {
      calls += 1;
      throw new ExtractionError(`fail ${calls}`);
    });

    await expect(
      executeWithBackoff(operation, { ...policy, retryOnEmptyResult: true, sleep })
    ).rejects.toThrow('fail 3');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 10000]);
  });

  it('stops retrying once an attempt succeeds', async () => {
    const sleep = sleeper();
    const operation = vi
      .fn(async (): Promise<string | null> => 'found')
      .mockResolvedValueOnce(null);

    await expect(executeWithBackoff(operation, { ...policy, retryOnEmptyResult: true, sleep })).resolves.toBe('found');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000]);
  });

  it('returns an empty result immediately when empty results are accepted', async () => {
    const sleep = sleeper();
    const operation = vi.fn(async (): Promise<string | null> => null);

    await expect(executeWithBackoff(operation, { ...policy, retryOnEmptyResult: false, sleep })).resolves.toBeNull();
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('returns the empty result after exhausting attempts on empty results only', async () => {
    const sleep = sleeper();
    const onRetry = vi.fn();
    const onGiveUp = vi.fn();
    const operation = vi.fn(async (): Promise<string | null> => null);

    await expect(
      executeWithBackoff(operation, { ...policy, retryOnEmptyResult: true, sleep, onRetry, onGiveUp })
    ).resolves.toBeNull();
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(2, { attempt: 2, maxAttempts: 3, delayMs: 10000, empty: true });
    expect(onGiveUp).toHaveBeenCalledWith({ attempt: 3, maxAttempts: 3, empty: true });
  });

  it('rethrows when any attempt faulted even if later attempts came back empty', async () => {
    const sleep = sleeper();
    const boom = new ExtractionError('connection reset');
    const operation = vi
      .fn(async (): Promise<string | null> => null)
      .mockRejectedValueOnce(boom);

    await expect(executeWithBackoff(operation, { ...policy, retryOnEmptyResult: true, sleep })).rejects.toBe(boom);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry faults rejected by shouldRetry', async () => {
    const sleep = sleeper();
    const onGiveUp = vi.fn();
    const invalid = new ValidationError('bad product');
    const operation = vi.fn(async (): Promise<string> => {
      throw invalid;
    });

    await expect(
      executeWithBackoff(operation, {
        ...policy,
        retryOnEmptyResult: true,
        shouldRetry: isRetryableError,
        onGiveUp,
        sleep,
      })
    ).rejects.toBe(invalid);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(onGiveUp).toHaveBeenCalledWith({ attempt: 1, maxAttempts: 3, error: invalid, empty: false });
  });

  it('runs exactly once with a single attempt', async () => {
    const sleep = sleeper();
    const operation = vi.fn(async (): Promise<string | null> => null);

    await expect(
      executeWithBackoff(operation, { ...policy, maxAttempts: 1, retryOnEmptyResult: true, sleep })
    ).resolves.toBeNull();
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rejects invalid options before running the operation', async () => {
    const operation = vi.fn(async () => 'ok');

    await expect(
      executeWithBackoff(operation, { ...policy, maxAttempts: 0, retryOnEmptyResult: true })
    ).rejects.toThrow(RangeError);
    await expect(
      executeWithBackoff(operation, { ...policy, backoffFactor: 0.5, retryOnEmptyResult: true })
    ).rejects.toThrow('backoffFactor must be >= 1, got 0.5');
    expect(operation).not.toHaveBeenCalled();
  });
});
