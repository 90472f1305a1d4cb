/**
 * Base class for failures reported by the storage client.
 * `retryable` tells the retry policy whether another attempt may succeed.
 */
export class StorageError extends Error {
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** Network unreachable, connection reset, request timed out */
export class ConnectivityError extends StorageError {
  override readonly retryable = true;

  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'ConnectivityError';
  }
}

/** Throttling or a transient 5xx answer from the service */
export class TransientServiceError extends StorageError {
  override readonly retryable = true;

  constructor(
    message: string,
    operation: string,
    public readonly statusCode?: number,
    cause?: Error
  ) {
    super(message, operation, cause);
    this.name = 'TransientServiceError';
  }
}

/** Invalid, expired or insufficient credentials */
export class AuthError extends StorageError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'AuthError';
  }
}

/** Bucket does not exist */
export class NotFoundError extends StorageError {
  constructor(
    message: string,
    operation: string,
    public readonly bucket?: string,
    cause?: Error
  ) {
    super(message, operation, cause);
    this.name = 'NotFoundError';
  }
}

/** Malformed request or response */
export class ProtocolError extends StorageError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'ProtocolError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
