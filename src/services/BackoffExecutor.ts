export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type BackoffOptions = {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  /** Treat a null/undefined result as a failed attempt. */
  retryOnEmptyResult: boolean;
  /** Faults for which this returns false are re-thrown without further attempts. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error?: unknown; empty: boolean }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error?: unknown; empty: boolean }) => void;
  sleep?: Sleep;
};

type Empty = null | undefined;

const isEmpty = (value: unknown): value is Empty => value === null || value === undefined;

const assertOptions = (opts: BackoffOptions): void => {
  if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${opts.maxAttempts}`);
  }
  if (!Number.isFinite(opts.initialDelayMs) || opts.initialDelayMs < 0) {
    throw new RangeError(`initialDelayMs must be >= 0, got ${opts.initialDelayMs}`);
  }
  if (!Number.isFinite(opts.backoffFactor) || opts.backoffFactor < 1) {
    throw new RangeError(`backoffFactor must be >= 1, got ${opts.backoffFactor}`);
  }
};

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export const backoffDelayMs = (attempt: number, initialDelayMs: number, backoffFactor: number): number =>
  initialDelayMs * Math.pow(backoffFactor, attempt - 1);

/**
 * Runs `operation` up to `maxAttempts` times, sleeping
 * initialDelayMs * backoffFactor^(attempt-1) between attempts.
 *
 * After the last attempt the most recent fault is re-thrown if any attempt
 * threw; if every failure was an empty result, the empty result is returned.
 */
export const executeWithBackoff = async <T>(
  operation: () => Promise<T | Empty>,
  opts: BackoffOptions
): Promise<T | Empty> => {
  assertOptions(opts);
  const { maxAttempts, initialDelayMs, backoffFactor, retryOnEmptyResult, shouldRetry, onRetry, onGiveUp } = opts;
  const sleep = opts.sleep ?? defaultSleep;

  let lastError: unknown;
  let hasError = false;
  let lastResult: T | Empty = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    let failure: { error?: unknown; empty: boolean };
    try {
      const result = await operation();
      if (!isEmpty(result) || !retryOnEmptyResult) {
        return result;
      }
      lastResult = result;
      failure = { empty: true };
    } catch (error) {
      if (shouldRetry && !shouldRetry(error)) {
        onGiveUp?.({ attempt, maxAttempts, error, empty: false });
        throw error;
      }
      lastError = error;
      hasError = true;
      failure = { error, empty: false };
    }

    if (attempt < maxAttempts) {
      const delayMs = backoffDelayMs(attempt, initialDelayMs, backoffFactor);
      onRetry?.({ attempt, maxAttempts, delayMs, ...failure });
      await sleep(delayMs);
    } else {
      onGiveUp?.({ attempt, maxAttempts, ...failure });
    }
  }

  if (hasError) {
    throw lastError;
  }
  return lastResult;
};
