/**
 * Retry and timeout helpers for engine calls.
 *
 * Exponential backoff with jitter, and a bounded wait that does not cancel the
 * underlying call.
 */

import { logger } from './logger';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  retryableErrors?: string[];
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 2,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterMs: 250,
  retryableErrors: [
    'fetch failed',
    'timeout',
    'timed out',
    'rate limit',
    'too many requests',
    'quota',
    'overloaded',
    '429',
    '500',
    '502',
    '503',
    '504',
    '529',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN'
  ]
};

export function isRetryableError(error: Error, retryableErrors: string[]): boolean {
  const message = error.message.toLowerCase();
  return retryableErrors.some(retryable => message.includes(retryable.toLowerCase()));
}

export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const jitter = Math.random() * jitterMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry an async operation with exponential backoff.
 * Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let attempt = 1;

  for (;;) {
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.info({ operationName, totalAttempts: attempt }, 'Operation succeeded after retry');
      }
      return result;
    } catch (caught) {
      const error = toError(caught);

      if (!isRetryableError(error, opts.retryableErrors || [])) {
        logger.warn({ operationName, attempt, error: error.message }, 'Operation failed with non-retryable error');
        throw error;
      }

      if (attempt >= opts.maxAttempts) {
        logger.warn({ operationName, totalAttempts: attempt, error: error.message }, 'Operation failed after all attempts');
        throw error;
      }

      const delay = calculateDelay(
        attempt,
        opts.baseDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier,
        opts.jitterMs
      );

      logger.warn({
        operationName,
        attempt,
        maxAttempts: opts.maxAttempts,
        error: error.message,
        delayMs: Math.round(delay)
      }, 'Operation failed, retrying');

      await new Promise(resolve => setTimeout(resolve, delay));
      attempt++;
    }
  }
}

/**
 * Race a promise against a timer. The losing call keeps running; only its result is ignored.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
