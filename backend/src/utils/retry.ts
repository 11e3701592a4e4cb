import { AxiosError } from 'axios';

export interface RetryOptions {
  /** Total attempts including the first call */
  attempts?: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  label?: string;
}

/**
 * Rate limits, overload, transient server errors and network resets.
 * Other 4xx responses (bad key, bad request) are not retried.
 */
export function isTransientHttpError(err: unknown): boolean {
  if (err instanceof AxiosError) {
    const status = err.response?.status;
    if (status !== undefined) {
      return status === 429 || status === 529 || status >= 500;
    }
    return (
      err.code === 'ECONNRESET' ||
      err.code === 'ETIMEDOUT' ||
      err.code === 'ECONNABORTED' ||
      err.code === 'ECONNREFUSED' ||
      err.code === 'ERR_NETWORK'
    );
  }
  return false;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff (1s, 2s, 4s by default)
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    baseDelayMs = 1000,
    isRetryable = isTransientHttpError,
    label = 'Retry',
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= attempts) {
        throw err;
      }
      const wait = Math.pow(2, attempt - 1) * baseDelayMs;
      console.warn(`[${label}] Attempt ${attempt}/${attempts} failed, retrying in ${wait}ms`);
      await delay(wait);
    }
  }
}

/**
 * Run `fn` over `items` in slices of `batchSize`, each slice in parallel.
 * Results keep the input order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    const batchResults = await Promise.all(batch.map((item, j) => fn(item, i + j)));
    results.push(...batchResults);
  }
  return results;
}
