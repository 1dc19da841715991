/**
 * CrunchDAO Client Error Classes
 *
 * Every failure reaches the caller as one of these classes. Nothing is retried
 * or recovered inside the client.
 */

import type { ApiError, ErrorCode } from './types';

/**
 * Base error class for all client errors.
 *
 * @example
 * ```typescript
 * try {
 *   await client.setComment(42, 'baseline');
 * } catch (error) {
 *   if (error instanceof CrunchError) {
 *     console.log(`Error: ${error.message}`);
 *     console.log(`Status: ${error.statusCode}`);
 *   }
 * }
 * ```
 */
export class CrunchError extends Error {
  /** HTTP status code, if the error came from a response */
  readonly statusCode: number | undefined;
  /** Alias for statusCode */
  get status(): number | undefined {
    return this.statusCode;
  }
  /** Machine-readable error code */
  readonly errorCode: ErrorCode | string | undefined;
  /** Alias for errorCode */
  get code(): ErrorCode | string | undefined {
    return this.errorCode;
  }
  /** Raw parsed response body, if available */
  readonly responseBody: Record<string, unknown> | undefined;

  constructor(
    message: string,
    statusCode?: number,
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CrunchError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.responseBody = responseBody;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a CrunchError from an HTTP error response.
   *
   * @param operation - Name of the client operation, used as message prefix
   */
  static fromResponse(operation: string, status: number, body: ApiError): CrunchError {
    const reason = reasonOf(body);
    const message = reason ? `${operation} failed: ${reason}` : `${operation} failed with status ${status}`;

    switch (status) {
      case 400:
        return new ValidationError(message, body.code, [], body);
      case 401:
        return new AuthenticationError(message, body.code ?? 'INVALID_API_KEY', body, 401);
      case 404:
        return new NotFoundError(message, body.code ?? 'NOT_FOUND', body);
      case 429:
        return new RateLimitError(message, body.retry_after, body.code ?? 'RATE_LIMITED', body);
      default:
        if (status >= 500) {
          return new ServerError(message, status, body.code, body);
        }
        return new CrunchError(message, status, body.code, body);
    }
  }

  /**
   * Format the error as a string with all relevant information.
   */
  override toString(): string {
    let result = this.name;
    if (this.statusCode) {
      result += ` (${this.statusCode})`;
    }
    if (this.errorCode) {
      result += ` [${this.errorCode}]`;
    }
    return `${result}: ${this.message}`;
  }
}

/**
 * Pull the server's reason out of an error body.
 */
export function reasonOf(body: ApiError): string | undefined {
  if (typeof body.error === 'string' && body.error) return body.error;
  if (typeof body.message === 'string' && body.message) return body.message;
  return undefined;
}

/**
 * Raised when the credential is missing or rejected.
 *
 * Authenticated operations throw this before any request when the client was
 * built without an API key.
 *
 * @example
 * ```typescript
 * try {
 *   await client.submissions();
 * } catch (error) {
 *   if (error instanceof AuthenticationError) {
 *     console.log('Set CRUNCHDAO_API_KEY or pass apiKey');
 *   }
 * }
 * ```
 */
export class AuthenticationError extends CrunchError {
  constructor(
    message: string = 'Authentication failed',
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>,
    statusCode?: number
  ) {
    super(message, statusCode, errorCode, responseBody);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised for malformed local input, before any request is made, or for a
 * `400` reply outside of an upload.
 */
export class ValidationError extends CrunchError {
  /** Field-level problems, one per offending path */
  readonly issues: Array<{ path: string; message: string }>;

  constructor(
    message: string = 'Validation failed',
    errorCode?: ErrorCode | string,
    issues: Array<{ path: string; message: string }> = [],
    responseBody?: Record<string, unknown>
  ) {
    super(message, responseBody ? 400 : undefined, errorCode, responseBody);
    this.name = 'ValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a resource does not exist or does not belong to the caller.
 *
 * @example
 * ```typescript
 * try {
 *   await client.setComment(999999, 'typo');
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     console.log('No such submission');
 *   }
 * }
 * ```
 */
export class NotFoundError extends CrunchError {
  constructor(
    message: string = 'Resource not found',
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>
  ) {
    super(message, 404, errorCode, responseBody);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RateLimitError extends CrunchError {
  /** Seconds the server asked to wait, when it said so */
  readonly retryAfter: number | undefined;

  constructor(
    message: string = 'Rate limit exceeded',
    retryAfter?: number,
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>
  ) {
    super(message, 429, errorCode, responseBody);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    const base = super.toString();
    return this.retryAfter ? `${base} (retry after ${this.retryAfter}s)` : base;
  }
}

export class ServerError extends CrunchError {
  constructor(
    message: string = 'Server error',
    statusCode: number = 500,
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>
  ) {
    super(message, statusCode, errorCode, responseBody);
    this.name = 'ServerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when the server rejects a prediction file: closed round, duplicate
 * file, empty file, submission quota.
 */
export class UploadError extends CrunchError {
  constructor(
    message: string = 'Upload failed',
    statusCode?: number,
    errorCode?: ErrorCode | string,
    responseBody?: Record<string, unknown>
  ) {
    super(message, statusCode, errorCode ?? 'UPLOAD_FAILED', responseBody);
    this.name = 'UploadError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a dataset file cannot be fetched or written.
 */
export class DownloadError extends CrunchError {
  /** File the download was writing to */
  readonly path: string | undefined;

  constructor(
    message: string = 'Download failed',
    statusCode?: number,
    path?: string,
    errorCode?: ErrorCode | string
  ) {
    super(message, statusCode, errorCode ?? 'DOWNLOAD_FAILED');
    this.name = 'DownloadError';
    this.path = path;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TimeoutError extends CrunchError {
  constructor(message: string = 'Request timed out') {
    super(message, undefined, 'SERVICE_UNAVAILABLE');
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConnectionError extends CrunchError {
  constructor(message: string = 'Connection failed') {
    super(message, undefined, 'SERVICE_UNAVAILABLE');
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Check if an error came from this client.
 */
export function isCrunchError(error: unknown): error is CrunchError {
  return error instanceof CrunchError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
