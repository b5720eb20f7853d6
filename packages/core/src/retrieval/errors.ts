/**
 * Error types for graph retrieval
 */

/**
 * Base error for retrieval operations
 */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly component: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RetrievalError';
  }
}

/**
 * Error for invalid input validation
 */
export class RetrievalValidationError extends RetrievalError {
  constructor(
    message: string,
    component: string,
    public readonly validationErrors: string[],
  ) {
    super(message, component, 'validation');
    this.name = 'RetrievalValidationError';
  }
}

/**
 * Error raised when the query cannot be embedded
 */
export class QueryEmbeddingError extends RetrievalError {
  constructor(
    message: string,
    public readonly query: string,
    cause?: Error,
  ) {
    super(message, 'WeightedRetriever', 'embed', cause);
    this.name = 'QueryEmbeddingError';
  }
}

/**
 * Error raised when a store read fails mid-traversal
 */
export class TraversalError extends RetrievalError {
  constructor(
    message: string,
    public readonly hop: number,
    cause?: Error,
  ) {
    super(message, 'WeightedRetriever', 'traverse', cause);
    this.name = 'TraversalError';
  }
}

/**
 * Check if an error is a RetrievalError or subclass
 */
export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}
