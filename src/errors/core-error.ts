import {
  type CoreErrorCode,
  type CoreErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_AUTH_REJECTED,
  ERROR_NETWORK,
  ERROR_TRANSFER_FAILED,
  ERROR_FILESYSTEM,
  ERROR_HTTP_STATUS,
  ERROR_STORE_UNAVAILABLE,
  ERROR_NOT_FOUND,
  ERROR_INVALID_REQUEST,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * JSON error body
 */
export interface CoreErrorResponse {
  error: CoreErrorCode;
  error_description?: string;
}

export interface CoreErrorOptions {
  cause?: unknown;
  statusCode?: CoreErrorStatus;
}

/**
 * Base class of every error raised by this library
 */
export class CoreError extends Error {
  public readonly code: CoreErrorCode;
  public readonly statusCode: CoreErrorStatus;
  public readonly description: string;

  constructor(code: CoreErrorCode, description?: string, options?: CoreErrorOptions) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CoreError';
    this.code = code;
    this.statusCode = options?.statusCode ?? ERROR_STATUS_CODES[code];
    this.description = desc;

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): CoreErrorResponse {
    const response: CoreErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  static notFound(description?: string): CoreError {
    return new CoreError(ERROR_NOT_FOUND, description);
  }

  static invalidRequest(description?: string): CoreError {
    return new CoreError(ERROR_INVALID_REQUEST, description);
  }

  static serverError(description?: string, cause?: unknown): CoreError {
    return new CoreError(ERROR_SERVER_ERROR, description, { cause });
  }
}

/**
 * The identity endpoint refused the credentials. Never retried.
 */
export class AuthRejectedError extends CoreError {
  /** OAuth error code reported by the endpoint, e.g. `invalid_grant` */
  public readonly remoteError: string | undefined;
  public readonly remoteStatus: number;

  constructor(remoteStatus: number, remoteError?: string, description?: string) {
    super(ERROR_AUTH_REJECTED, description);
    this.name = 'AuthRejectedError';
    this.remoteStatus = remoteStatus;
    this.remoteError = remoteError;
  }
}

/**
 * Transport failure talking to the identity or probe endpoint
 */
export class NetworkError extends CoreError {
  public readonly remoteStatus: number | undefined;

  constructor(description?: string, options?: { cause?: unknown; remoteStatus?: number }) {
    super(ERROR_NETWORK, description, { cause: options?.cause });
    this.name = 'NetworkError';
    this.remoteStatus = options?.remoteStatus;
  }

  static fromError(error: unknown): NetworkError {
    const message = error instanceof Error ? error.message : 'Network request failed';
    return new NetworkError(message, { cause: error });
  }
}

/**
 * Unexpected HTTP status from a transfer source
 */
export class HttpStatusError extends CoreError {
  public readonly remoteStatus: number;
  public readonly url: string;

  constructor(remoteStatus: number, url: string, statusText = '') {
    super(ERROR_HTTP_STATUS, `HTTP ${remoteStatus}${statusText ? ` ${statusText}` : ''} from ${url}`);
    this.name = 'HttpStatusError';
    this.remoteStatus = remoteStatus;
    this.url = url;
  }
}

/**
 * A download gave up: terminal status, exhausted budget or caller abort
 */
export class TransferFailedError extends CoreError {
  public readonly url: string;
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(url: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(ERROR_TRANSFER_FAILED, `Transfer of ${url} failed after ${attempts} attempt(s): ${reason}`, {
      cause: lastError,
    });
    this.name = 'TransferFailedError';
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * The destination path cannot be created or written
 */
export class FilesystemError extends CoreError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_FILESYSTEM, `Cannot write ${path}: ${reason}`, { cause });
    this.name = 'FilesystemError';
    this.path = path;
  }
}

/**
 * The backing store could not be reached while acquiring a session
 */
export class StoreUnavailableError extends CoreError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_STORE_UNAVAILABLE, `Backing store unavailable: ${reason}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}
