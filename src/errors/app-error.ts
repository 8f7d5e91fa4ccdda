export class AppError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Pre-flight problem with the input file or output directory. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class FetchError extends AppError {
  readonly url: string;

  constructor(
    message: string,
    url: string,
    httpStatus?: number,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(
      message,
      httpStatus ? `HTTP_${httpStatus}` : 'FETCH_ERROR',
      { url, httpStatus, ...details },
      options
    );
    this.url = url;
  }
}
