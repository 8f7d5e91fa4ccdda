import { describe, expect, it } from 'vitest';

import {
  AppError,
  ConfigurationError,
  FetchError,
} from '../src/errors/app-error.js';

describe('ConfigurationError', () => {
  it('carries its code and details', () => {
    const error = new ConfigurationError('File x.csv is not a text file.', {
      file: 'x.csv',
    });

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.details).toEqual({ file: 'x.csv' });
  });

  it('has no HTTP status', () => {
    expect(new ConfigurationError('bad')).not.toHaveProperty('statusCode');
  });
});

describe('FetchError', () => {
  it('derives its code from the HTTP status', () => {
    const error = new FetchError('HTTP 404', 'https://example.com/a', 404, {
      reason: 'http-status',
    });

    expect(error.code).toBe('HTTP_404');
    expect(error.url).toBe('https://example.com/a');
    expect(error.details).toEqual({
      url: 'https://example.com/a',
      httpStatus: 404,
      reason: 'http-status',
    });
    expect(error).not.toHaveProperty('statusCode');
  });

  it('uses FETCH_ERROR without a status and keeps the cause', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = new FetchError(
      'Network error',
      'https://example.com/a',
      undefined,
      { reason: 'network' },
      { cause }
    );

    expect(error.code).toBe('FETCH_ERROR');
    expect(error.cause).toBe(cause);
  });
});
