/**
 * Retry logic with exponential backoff
 */

import { logger } from './logger.js';
import { isRecoverableError } from './errors.js';

const log = logger.child('retry');

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Fraction of the base delay added as random jitter */
  jitter?: number;
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      `Gave up after ${attempts} attempts: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.attempts = attempts;
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Delay for a given attempt (1-based) before jitter
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  backoffMultiplier: number,
  maxDelayMs: number
): number {
  return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
}

/**
 * Retry with exponential backoff
 *
 * Non-retryable errors are rethrown as they are; a retryable error that
 * survives every attempt is wrapped in RetryExhaustedError.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const initialDelayMs = options.initialDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 30000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const jitter = options.jitter ?? 0.3;
  const isRetryable = options.isRetryable ?? isRecoverableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      if (options.signal?.aborted) {
        throw error;
      }

      const baseDelay = backoffDelay(attempt, initialDelayMs, backoffMultiplier, maxDelayMs);
      const delay = baseDelay + Math.random() * jitter * baseDelay;

      log.warn('Retrying after error', {
        attempt,
        maxAttempts,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      options.onRetry?.(attempt, error, delay);

      await sleep(delay, options.signal);
      if (options.signal?.aborted) {
        throw error;
      }
    }
  }
}

/**
 * Sleep that wakes early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
