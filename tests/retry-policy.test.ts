import { describe, expect, it, vi } from 'vitest';

import { FetchError } from '../src/errors/app-error.js';
import {
  calculateDelay,
  executeWithRetry,
  isConnectFailure,
} from '../src/services/fetcher/retry-policy.js';

const URL_A = 'https://example.com/a';
const NO_DELAY = { retries: 3, baseDelayMs: 0, maxDelayMs: 0 };

function connectFailure(): FetchError {
  return new FetchError('Network error', URL_A, undefined, {
    reason: 'network',
    code: 'ECONNREFUSED',
  });
}

describe('calculateDelay', () => {
  const options = { retries: 3, baseDelayMs: 500, maxDelayMs: 120_000 };

  it('doubles the delay after each attempt', () => {
    expect(calculateDelay(1, options)).toBe(500);
    expect(calculateDelay(2, options)).toBe(1000);
    expect(calculateDelay(3, options)).toBe(2000);
  });

  it('caps the delay', () => {
    expect(calculateDelay(20, options)).toBe(120_000);
  });
});

describe('isConnectFailure', () => {
  it('matches fetch errors carrying a connect error code', () => {
    expect(isConnectFailure(connectFailure())).toBe(true);
  });

  it('ignores other errors', () => {
    expect(
      isConnectFailure(
        new FetchError('HTTP 500', URL_A, 500, { reason: 'http-status' })
      )
    ).toBe(false);
    expect(isConnectFailure(new Error('ECONNREFUSED'))).toBe(false);
  });
});

describe('executeWithRetry', () => {
  it('returns the first successful result', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(connectFailure())
      .mockResolvedValueOnce('done');

    await expect(executeWithRetry(URL_A, NO_DELAY, operation)).resolves.toBe(
      'done'
    );
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('rethrows non-connect errors immediately', async () => {
    const failure = new FetchError('HTTP 503', URL_A, 503, {
      reason: 'http-status',
    });
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(executeWithRetry(URL_A, NO_DELAY, operation)).rejects.toBe(
      failure
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('wraps the last error after exhausting retries', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValue(connectFailure());

    const error: unknown = await executeWithRetry(URL_A, NO_DELAY, operation).catch(
      (caught: unknown) => caught
    );

    expect(operation).toHaveBeenCalledTimes(4);
    expect(error).toBeInstanceOf(FetchError);
    if (error instanceof FetchError) {
      expect(error.message).toBe('Failed after 4 attempts: Network error');
      expect(error.details.attempts).toBe(4);
      expect(error.details.reason).toBe('network');
    }
  });
});
