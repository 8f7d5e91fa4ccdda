import { setTimeout } from 'node:timers/promises';

import { FetchError } from '../../errors/app-error.js';

import { logDebug, logWarn } from '../logger.js';

export interface RetryOptions {
  /** Retries after the first attempt */
  readonly retries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/** Failures that happen before a connection is established. */
const CONNECT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export async function executeWithRetry<T>(
  url: string,
  options: RetryOptions,
  operation: () => Promise<T>
): Promise<T> {
  const retries = normalizeRetries(options.retries);
  const maxAttempts = retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(attempt, maxAttempts, error)) {
        throw attempt > 1 ? buildFinalError(url, attempt, error) : error;
      }
      await wait(url, attempt, calculateDelay(attempt, options));
    }
  }
}

export function isConnectFailure(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  const { code } = error.details;
  return typeof code === 'string' && CONNECT_ERROR_CODES.has(code);
}

function shouldRetry(
  attempt: number,
  maxAttempts: number,
  error: unknown
): boolean {
  if (attempt >= maxAttempts) return false;
  return isConnectFailure(error);
}

/** `base * 2^(attempt-1)`, capped: 500ms, 1s, 2s with the defaults. */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(exponentialDelay, options.maxDelayMs);
}

function normalizeRetries(retries: number): number {
  return Math.min(Math.max(0, retries), 10);
}

function buildFinalError(url: string, attempts: number, error: unknown): unknown {
  if (!(error instanceof FetchError)) return error;
  return new FetchError(
    `Failed after ${attempts} attempts: ${error.message}`,
    url,
    undefined,
    { ...error.details, attempts },
    { cause: error }
  );
}

async function wait(url: string, attempt: number, delay: number): Promise<void> {
  if (attempt === 1) {
    logDebug('Connection failed, retrying', { url, attempt, delay: `${delay}ms` });
  } else {
    logWarn('Connection failed again, retrying', {
      url,
      attempt,
      delay: `${delay}ms`,
    });
  }
  if (delay > 0) await setTimeout(delay);
}
