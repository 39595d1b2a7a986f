/**
 * Retry and timeout helpers
 */

import { isRetryableError, withRetry, withTimeout } from '../retry';

const fast = { baseDelayMs: 1, jitterMs: 0 };

describe('withRetry', () => {
  it('retries a transient failure once', async () => {
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('socket hang up: ECONNRESET'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(operation, 'test', fast)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('rethrows a non-retryable error without retrying', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('invalid api key'));

    await expect(withRetry(operation, 'test', fast)).rejects.toThrow('invalid api key');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(withRetry(operation, 'test', { ...fast, maxAttempts: 3 })).rejects.toThrow('503');
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe('isRetryableError', () => {
  it('matches case-insensitively', () => {
    expect(isRetryableError(new Error('Rate Limit exceeded'), ['rate limit'])).toBe(true);
    expect(isRetryableError(new Error('bad request'), ['rate limit'])).toBe(false);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the call is fast enough', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'fast call')).resolves.toBe(7);
  });

  it('rejects with a labelled timeout', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10, 'gemini OCR')).rejects.toThrow('gemini OCR timed out after 10ms');
  });
});
