import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';

import {
  CONCURRENCY,
  DEFAULT_USER_AGENT,
  RETRY,
  SIZE_LIMITS,
  TEXT_FILE_EXTENSION,
  TIMEOUT,
} from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parsePath,
} from './env-parsers.js';

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../../package.json', import.meta.url)
);
const packageJson = require(packageJsonPath) as { version?: string };
if (typeof packageJson.version !== 'string') {
  throw new Error('package.json version is missing');
}

const DEFAULT_OUTPUT_DIR = '~/Documents/URL Text';

export const config = {
  app: {
    name: 'url-text',
    version: packageJson.version,
  },
  fetcher: {
    timeout: parseInteger(
      process.env.FETCH_TIMEOUT,
      TIMEOUT.DEFAULT_FETCH_TIMEOUT_MS,
      TIMEOUT.MIN_FETCH_TIMEOUT_MS,
      TIMEOUT.MAX_FETCH_TIMEOUT_MS
    ),
    userAgent: process.env.USER_AGENT ?? DEFAULT_USER_AGENT,
    connectRetries: parseInteger(
      process.env.FETCH_CONNECT_RETRIES,
      RETRY.DEFAULT_CONNECT_RETRIES,
      0,
      RETRY.MAX_CONNECT_RETRIES
    ),
    retryBaseDelayMs: parseInteger(
      process.env.FETCH_RETRY_BASE_DELAY,
      RETRY.BASE_DELAY_MS,
      0,
      RETRY.MAX_DELAY_MS
    ),
    retryMaxDelayMs: RETRY.MAX_DELAY_MS,
    maxContentLength: SIZE_LIMITS.TEN_MB,
  },
  input: {
    extension: TEXT_FILE_EXTENSION,
  },
  output: {
    defaultDir: parsePath(process.env.OUTPUT_DIR, DEFAULT_OUTPUT_DIR),
    extension: TEXT_FILE_EXTENSION,
  },
  batch: {
    concurrency: parseInteger(
      process.env.BATCH_CONCURRENCY,
      CONCURRENCY.DEFAULT,
      1,
      CONCURRENCY.MAX
    ),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(process.env.ENABLE_LOGGING, true),
  },
} as const;
