// Custom error types for agent operations
import type { ZodError } from 'zod';

/**
 * Base error for all agent-related errors
 */
export class AgentError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AgentError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when LLM response fails to parse as JSON
 */
export class LLMResponseParseError extends AgentError {
  constructor(
    message: string,
    public readonly rawResponse: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'LLMResponseParseError';
  }
}

/**
 * Thrown when LLM response fails Zod schema validation
 */
export class LLMResponseValidationError extends AgentError {
  constructor(
    message: string,
    public readonly rawResponse: string,
    public readonly validationErrors: ZodError['errors'],
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'LLMResponseValidationError';
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return this.validationErrors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

/**
 * Thrown when the LLM call behind an extraction fails
 */
export class GraphExtractionError extends AgentError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'GraphExtractionError';
  }
}
