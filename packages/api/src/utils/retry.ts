import { sleep } from './timeout';
import { OperationAborted } from '../errors';
import { logger } from './logger';

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Retry with exponential backoff and jitter. Bounded by `maxAttempts`;
 * aborts are never retried.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 2,
    initialDelay = 200,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    signal,
    label = 'operation',
  } = options;

  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (error instanceof OperationAborted || attempt === attempts) {
        throw error;
      }

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt - 1);
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn(
        { label, attempt, maxAttempts: attempts, delay: Math.round(delay), error: error instanceof Error ? error.message : String(error) },
        'Retrying after failure'
      );
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
