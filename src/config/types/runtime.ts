// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMetadata = Record<string, unknown>;

// Fetcher types
export interface HttpClientOptions {
  userAgent?: string;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Retries after the first attempt; connection failures only */
  connectRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  maxContentLength?: number;
}

export type FetchFailureReason =
  | 'network'
  | 'http-status'
  | 'redirect'
  | 'timeout'
  | 'too-large'
  | 'invalid-url';

export interface FetchSuccess {
  readonly ok: true;
  readonly url: string;
  readonly status: number;
  readonly body: string;
  readonly size: number;
}

export interface FetchFailure {
  readonly ok: false;
  readonly url: string;
  readonly reason: FetchFailureReason;
  readonly status?: number;
  readonly message: string;
}

export type FetchResult = FetchSuccess | FetchFailure;
