import { XPError } from './errors';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY: RetryOptions = { attempts: 3, baseDelayMs: 200, maxDelayMs: 5000 };

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const backoffDelay = (attempt: number, options: RetryOptions): number => {
  const exponential = options.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = Math.random() * options.baseDelayMs;
  return Math.min(exponential + jitter, options.maxDelayMs ?? Number.POSITIVE_INFINITY);
};

const isRetryable = (error: unknown) => error instanceof XPError && error.retryable;

/**
 * Runs `operation` until it succeeds, a non-retryable error comes back or the
 * attempts run out. Only safe for operations that are idempotent on their own.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY,
): Promise<T> => {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt === options.attempts) break;
      await wait(backoffDelay(attempt, options));
    }
  }

  throw lastError;
};
