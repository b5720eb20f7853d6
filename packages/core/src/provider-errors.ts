// Failure classes shared by the OpenAI-backed LLM and embedding providers
import { APIError } from 'openai';

export type ProviderFailure =
  | 'authentication'
  | 'permission'
  | 'rate_limit'
  | 'model_not_found'
  | 'context_length'
  | 'content_filter'
  | 'invalid_input'
  | 'server'
  | 'bad_response'
  | 'aborted'
  | 'unknown';

const RETRYABLE_FAILURES: ReadonlySet<ProviderFailure> = new Set([
  'rate_limit',
  'server',
]);

export interface ProviderErrorOptions {
  cause?: Error;
  /** HTTP status of the failed call */
  status?: number;
  retryAfterMs?: number;
}

/**
 * Base class of LLMError and EmbeddingError
 */
export class ProviderError extends Error {
  public readonly cause?: Error;
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    public readonly failure: ProviderFailure,
    options: ProviderErrorOptions = {},
  ) {
    super(message);
    this.name = 'ProviderError';
    this.cause = options.cause;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** True when the same request can succeed later unchanged */
  get retryable(): boolean {
    return RETRYABLE_FAILURES.has(this.failure);
  }
}

/**
 * Map an OpenAI API error onto a failure class. 400s are split by message
 * since the API reuses the status for several causes.
 */
export function classifyAPIError(error: APIError): ProviderFailure {
  const message = error.message.toLowerCase();
  switch (error.status) {
    case 401:
      return 'authentication';
    case 403:
      return 'permission';
    case 404:
      return 'model_not_found';
    case 429:
      return 'rate_limit';
    case 400:
      if (
        message.includes('context_length') ||
        message.includes('maximum context')
      ) {
        return 'context_length';
      }
      if (message.includes('content_filter') || message.includes('safety')) {
        return 'content_filter';
      }
      if (message.includes('too long') || message.includes('maximum')) {
        return 'invalid_input';
      }
      return 'unknown';
  }
  return error.status !== undefined && error.status >= 500
    ? 'server'
    : 'unknown';
}

/**
 * Milliseconds from a retry-after header given in seconds
 */
export function parseRetryAfter(error: APIError): number | undefined {
  const value = error.headers?.['retry-after'];
  if (typeof value !== 'string') return undefined;
  const seconds = Number.parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Whether an error, or any error in its cause chain, is a retryable
 * provider failure
 */
export function isRetryableError(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ProviderError) return current.retryable;
    seen.add(current);
    current = current.cause;
  }
  return false;
}
