import type { Dispatcher } from 'undici';

import { config } from '../config/index.js';
import type {
  FetchFailure,
  FetchFailureReason,
  FetchResult,
  FetchSuccess,
  HttpClientOptions,
} from '../config/types.js';

import { FetchError } from '../errors/app-error.js';

import { getErrorMessage } from '../utils/error-details.js';

import { createAgent, resolveConnectTimeout } from './fetcher/agents.js';
import { buildDefaultHeaders } from './fetcher/headers.js';
import { createRedirectError, isRedirectStatus } from './fetcher/redirects.js';
import { readResponseText } from './fetcher/response.js';
import { executeWithRetry, type RetryOptions } from './fetcher/retry-policy.js';
import { logDebug } from './logger.js';

export interface CreateHttpClientOptions extends HttpClientOptions {
  /** Replaces the pooled agent; the caller then owns its lifecycle. */
  dispatcher?: Dispatcher;
}

export interface HttpClient {
  /** Resolves with a failure result instead of rejecting. */
  fetchPage(url: string): Promise<FetchResult>;
  close(): Promise<void>;
}

const SUPPORTED_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:']);

const FAILURE_REASONS: ReadonlySet<string> = new Set<FetchFailureReason>([
  'network',
  'http-status',
  'redirect',
  'timeout',
  'too-large',
  'invalid-url',
]);

function isFailureReason(value: unknown): value is FetchFailureReason {
  return typeof value === 'string' && FAILURE_REASONS.has(value);
}

function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if (!('name' in error)) return false;
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

function readCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  if (!('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

/** undici reports socket errors as `TypeError('fetch failed')` with a cause. */
function resolveSystemCode(error: unknown): string | undefined {
  const direct = readCode(error);
  if (direct) return direct;
  if (!(error instanceof Error)) return undefined;

  const { cause } = error;
  const fromCause = readCode(cause);
  if (fromCause) return fromCause;
  if (cause instanceof AggregateError) {
    const errors: unknown[] = cause.errors;
    return readCode(errors[0]);
  }
  return undefined;
}

function describeCause(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return error.cause.message;
  }
  return getErrorMessage(error);
}

function createTimeoutError(url: string, timeoutMs: number): FetchError {
  return new FetchError(`Request timeout after ${timeoutMs}ms`, url, undefined, {
    reason: 'timeout',
    timeout: timeoutMs,
  });
}

function createHttpError(
  url: string,
  status: number,
  statusText: string
): FetchError {
  const message = statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`;
  return new FetchError(message, url, status, { reason: 'http-status' });
}

function createNetworkError(url: string, error: unknown): FetchError {
  return new FetchError(
    `Network error: Could not reach ${url} (${describeCause(error)})`,
    url,
    undefined,
    { reason: 'network', code: resolveSystemCode(error) },
    { cause: error }
  );
}

function mapFetchError(
  error: unknown,
  url: string,
  timeoutMs: number
): FetchError {
  if (error instanceof FetchError) return error;
  if (isAbortError(error)) return createTimeoutError(url, timeoutMs);
  return createNetworkError(url, error);
}

function toFetchFailure(url: string, error: unknown): FetchFailure {
  if (!(error instanceof FetchError)) {
    return { ok: false, url, reason: 'network', message: getErrorMessage(error) };
  }

  const { reason, httpStatus } = error.details;
  return {
    ok: false,
    url,
    reason: isFailureReason(reason) ? reason : 'network',
    ...(typeof httpStatus === 'number' ? { status: httpStatus } : {}),
    message: error.message,
  };
}

function cancelResponseBody(response: Response): void {
  const cancelPromise = response.body?.cancel();
  if (cancelPromise)
    cancelPromise.catch(() => {
      /* body already released */
    });
}

class HttpFetcher implements HttpClient {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxContentLength: number;
  private readonly retryOptions: RetryOptions;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: CreateHttpClientOptions) {
    this.headers = buildDefaultHeaders(
      options.userAgent ?? config.fetcher.userAgent
    );
    this.timeoutMs = options.timeoutMs ?? config.fetcher.timeout;
    this.maxContentLength =
      options.maxContentLength ?? config.fetcher.maxContentLength;
    this.retryOptions = {
      retries: options.connectRetries ?? config.fetcher.connectRetries,
      baseDelayMs: options.retryBaseDelayMs ?? config.fetcher.retryBaseDelayMs,
      maxDelayMs: options.retryMaxDelayMs ?? config.fetcher.retryMaxDelayMs,
    };
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      createAgent({ connectTimeoutMs: resolveConnectTimeout(this.timeoutMs) });
  }

  async fetchPage(url: string): Promise<FetchResult> {
    if (!URL.canParse(url)) {
      return { ok: false, url, reason: 'invalid-url', message: 'Invalid URL format' };
    }

    const { protocol } = new URL(url);
    if (!SUPPORTED_PROTOCOLS.has(protocol)) {
      return {
        ok: false,
        url,
        reason: 'invalid-url',
        message: `Unsupported protocol: ${protocol}`,
      };
    }

    try {
      return await executeWithRetry(url, this.retryOptions, () =>
        this.attempt(url)
      );
    } catch (error) {
      return toFetchFailure(url, error);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }

  private async attempt(url: string): Promise<FetchSuccess> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    try {
      const requestInit: RequestInit & { dispatcher?: Dispatcher } = {
        method: 'GET',
        headers: this.headers,
        redirect: 'manual',
        signal,
        dispatcher: this.dispatcher,
      };
      const response = await fetch(url, requestInit);

      if (isRedirectStatus(response.status)) {
        cancelResponseBody(response);
        throw createRedirectError(
          url,
          response.status,
          response.headers.get('location')
        );
      }

      if (!response.ok) {
        cancelResponseBody(response);
        throw createHttpError(url, response.status, response.statusText);
      }

      const { text, size } = await readResponseText(
        response,
        url,
        this.maxContentLength
      );
      logDebug('Fetched page', { url, status: response.status, size });

      return {
        ok: true,
        url,
        status: response.status,
        body: text,
        size,
      };
    } catch (error) {
      throw mapFetchError(error, url, this.timeoutMs);
    }
  }
}

/** Builds the client shared by every item of a batch run. */
export function createHttpClient(
  options: CreateHttpClientOptions = {}
): HttpClient {
  return new HttpFetcher(options);
}
