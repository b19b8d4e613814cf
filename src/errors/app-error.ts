/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    details?: Record<string, unknown>,
    code = 'VALIDATION_ERROR'
  ) {
    super(message, 400, code);
    this.details = details;
  }
}

/**
 * URL validation error (400). Raised before any network call.
 */
export class UrlValidationError extends ValidationError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, { url }, 'INVALID_URL');
    this.url = url;
  }
}

/**
 * Fetch error - network/HTTP errors during a download attempt
 */
export class FetchError extends AppError {
  public readonly url: string;
  public readonly httpStatus?: number;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    url: string,
    httpStatus?: number,
    details: Record<string, unknown> = {},
    code?: string
  ) {
    super(
      message,
      httpStatus ?? 502,
      code ?? (httpStatus ? `HTTP_${httpStatus}` : 'FETCH_ERROR')
    );
    this.url = url;
    this.httpStatus = httpStatus;
    this.details = Object.freeze({ ...details });
  }

  get aborted(): boolean {
    return this.details.reason === 'aborted';
  }
}

/**
 * The server answered with something that is not media, usually an HTML
 * error page served with status 200.
 */
export class ContentMismatchError extends FetchError {
  public readonly contentType: string;
  public readonly sample: string;

  constructor(url: string, contentType: string, sample: string) {
    super(
      `Unexpected content-type: ${contentType}`,
      url,
      undefined,
      { contentType, sample },
      'CONTENT_MISMATCH'
    );
    this.contentType = contentType;
    this.sample = sample;
  }
}

/**
 * Terminal download failure once the attempt budget is spent.
 */
export class DownloadFailedError extends AppError {
  public readonly url: string;
  public readonly attempts: number;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(url: string, attempts: number, lastError: Error) {
    const noun = attempts === 1 ? 'attempt' : 'attempts';
    super(
      `Download failed after ${attempts} ${noun}: ${lastError.message}`,
      500,
      'DOWNLOAD_FAILED',
      true,
      { cause: lastError }
    );
    this.url = url;
    this.attempts = attempts;
    this.details = Object.freeze({
      url,
      attempts,
      lastError: lastError.message,
      ...(lastError instanceof AppError && { lastErrorCode: lastError.code }),
      ...(lastError instanceof ContentMismatchError && {
        contentType: lastError.contentType,
        sample: lastError.sample,
      }),
    });
  }
}

/**
 * Failure reported by the messaging client. Never retried.
 */
export class UploadError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'UPLOAD_ERROR', true, { cause });
  }
}

/**
 * Missing or invalid startup configuration
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIG_ERROR', false);
  }
}

/**
 * Unauthorized error (401)
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}
