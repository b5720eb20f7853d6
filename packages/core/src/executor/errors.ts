// Error types for chunk ingestion
import type { ChunkFailureKind } from '@graphweave/shared';

/**
 * Base error for ingestion operations
 */
export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'IngestionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown before any chunk runs when an ingestion request is malformed
 */
export class SchedulerValidationError extends IngestionError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(message);
    this.name = 'SchedulerValidationError';
  }
}

/**
 * Thrown when a worker pool is used after it was closed
 */
export class WorkerPoolClosedError extends IngestionError {
  constructor() {
    super('Worker pool is closed');
    this.name = 'WorkerPoolClosedError';
  }
}

/**
 * Failure of a single chunk; carries the kind reported in its result
 */
export class ChunkError extends IngestionError {
  constructor(
    message: string,
    public readonly chunkId: string,
    public readonly kind: ChunkFailureKind,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ChunkError';
  }
}

export class ChunkExtractionError extends ChunkError {
  constructor(message: string, chunkId: string, cause?: Error) {
    super(message, chunkId, 'extraction', cause);
    this.name = 'ChunkExtractionError';
  }
}

export class ChunkTimeoutError extends ChunkError {
  constructor(
    chunkId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Chunk ${chunkId} timed out after ${timeoutMs}ms`, chunkId, 'timeout');
    this.name = 'ChunkTimeoutError';
  }
}

export class ChunkStorageError extends ChunkError {
  constructor(message: string, chunkId: string, cause?: Error) {
    super(message, chunkId, 'storage', cause);
    this.name = 'ChunkStorageError';
  }
}

/**
 * Message of an error's root cause, for failure results
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error
      ? `${error.message}: ${error.cause.message}`
      : error.message;
  }
  return String(error);
}
