// Server error types for graphweave
// Follows the same pattern as core package errors

import {
  isGraphError,
  isRetrievalError,
  isStorageError,
  QueryEmbeddingError,
  RetrievalValidationError,
  SchedulerValidationError,
} from '@graphweave/core';

/**
 * Base error class for all server-related errors
 */
export class ServerError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ServerError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set cause for error chaining
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when server configuration is invalid
 */
export class ServerConfigError extends ServerError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ServerConfigError';
  }
}

/**
 * Thrown when HTTP transport configuration is invalid
 */
export class TransportConfigError extends ServerError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'TransportConfigError';
  }
}

/**
 * Thrown when server fails to start
 */
export class ServerStartError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStartError';
  }
}

/**
 * Thrown when server fails to stop gracefully
 */
export class ServerStopError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStopError';
  }
}

/**
 * Thrown when a request body cannot be accepted
 */
export class RequestBodyError extends ServerError {
  constructor(
    message: string,
    public readonly statusCode: 400 | 413,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'RequestBodyError';
  }
}

/**
 * Wrap an unknown error as a ServerError
 */
export function wrapServerError(error: unknown, message: string): ServerError {
  if (error instanceof ServerError) {
    return error;
  }
  if (error instanceof Error) {
    return new ServerError(message, error);
  }
  return new ServerError(`${message}: ${String(error)}`);
}

/**
 * Format error for MCP tool response
 */
export function formatToolError(
  error: unknown,
  toolName: string,
): {
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
} {
  let errorMessage: string;

  if (
    error instanceof SchedulerValidationError ||
    error instanceof RetrievalValidationError
  ) {
    errorMessage = `Validation error in ${toolName}:\n${error.validationErrors.map((e) => `  - ${e}`).join('\n')}`;
  } else if (error instanceof QueryEmbeddingError) {
    errorMessage = `Failed to embed query: ${error.cause?.message ?? error.message}`;
  } else if (isRetrievalError(error)) {
    errorMessage = `Retrieval failed: ${error.cause?.message ?? error.message}`;
  } else if (isStorageError(error)) {
    errorMessage = `Storage error in ${toolName}: ${error.message}`;
  } else if (isGraphError(error)) {
    errorMessage = `Graph error in ${toolName}: ${error.message}`;
  } else if (error instanceof Error) {
    errorMessage = `Error in ${toolName}: ${error.message}`;
  } else {
    errorMessage = `Unknown error in ${toolName}: ${String(error)}`;
  }

  return {
    content: [{ type: 'text' as const, text: errorMessage }],
    isError: true,
  };
}
