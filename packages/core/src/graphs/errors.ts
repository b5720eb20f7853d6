// Custom error types for graph mutation

/**
 * Base error for all graph-related errors
 */
export class GraphError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GraphError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an extracted fragment is not shaped like a graph fragment
 */
export class FragmentValidationError extends GraphError {
  constructor(
    message: string,
    public readonly chunkId: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'FragmentValidationError';
  }
}

/**
 * Thrown when a fragment cannot be applied for reasons other than storage,
 * such as a failed embedding call
 */
export class MutationError extends GraphError {
  constructor(
    message: string,
    public readonly chunkId: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'MutationError';
  }
}

/**
 * Check if an error is a GraphError or subclass
 */
export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}
