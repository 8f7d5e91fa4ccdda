const BYTES = {
  MB: 1024 * 1024,
} as const;

export const SIZE_LIMITS = {
  TEN_MB: 10 * BYTES.MB,
} as const;

export const TIMEOUT = {
  DEFAULT_FETCH_TIMEOUT_MS: 30000,
  MIN_FETCH_TIMEOUT_MS: 1000,
  MAX_FETCH_TIMEOUT_MS: 120000,
  MAX_CONNECT_TIMEOUT_MS: 10000,
} as const;

export const RETRY = {
  DEFAULT_CONNECT_RETRIES: 3,
  MAX_CONNECT_RETRIES: 10,
  BASE_DELAY_MS: 500,
  MAX_DELAY_MS: 120000,
} as const;

export const CONCURRENCY = {
  DEFAULT: 1,
  MAX: 10,
} as const;

export const TEXT_FILE_EXTENSION = '.txt';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.0.1 Safari/605.1.15';
