// Custom error types for storage layer

/**
 * Base error for all storage-related errors
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StorageError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when connection to database fails or is not established
 */
export class ConnectionError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Thrown when a database query fails
 */
export class QueryError extends StorageError {
  constructor(
    message: string,
    public readonly query?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'QueryError';
  }
}

/**
 * Thrown when storage configuration is invalid
 */
export class StorageConfigError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'StorageConfigError';
  }
}

/**
 * Thrown when a row read back from the database does not match its schema
 */
export class StorageParseError extends StorageError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'StorageParseError';
  }
}

/**
 * Thrown when a transaction is used after it committed or failed
 */
export class TransactionStateError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionStateError';
  }
}

/**
 * Check if an error is a StorageError or subclass
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}
