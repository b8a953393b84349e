/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for page retrieval failures (network, timeout, HTTP status).
 * `statusCode` is 0 when no response was received.
 */
export class FetchError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error
  ) {
    super(message, 'FETCH_ERROR', statusCode, cause);
  }
}

/**
 * Error reading persisted match state
 */
export class StorageLoadError extends AppError {
  constructor(message: string, public key: string, cause?: Error) {
    super(message, 'STORAGE_LOAD_ERROR', 500, cause);
  }
}

/**
 * Error writing persisted match state
 */
export class StorageSaveError extends AppError {
  constructor(message: string, public key: string, cause?: Error) {
    super(message, 'STORAGE_SAVE_ERROR', 500, cause);
  }
}

/**
 * Error for Kafka operations
 */
export class PublishError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'PUBLISH_ERROR', 500, cause);
  }
}

/**
 * Coerces an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
