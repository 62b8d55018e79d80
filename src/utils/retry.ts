/**
 * Retry with exponential backoff and jitter
 */

import { createLogger } from './logger.js';

const log = createLogger('retry');

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  label?: string;
  signal?: AbortSignal;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const {
    initialDelay = 100,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
  } = options;

  const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
  // Add jitter (random 0-25% of delay)
  const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitterAmount, maxDelay);
}

/**
 * Run fn, retrying up to maxRetries times. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, shouldRetry = () => true, label = 'operation', signal } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error, attempt) || signal?.aborted) {
        throw error;
      }

      const delay = backoffDelay(attempt, options);
      log.warn({
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      }, 'Retrying after failure');
      await sleep(delay, signal);
    }
  }
}

/**
 * Reject with the given error if promise does not settle within ms.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
