// Errors raised by LLM providers
import {
  ProviderError,
  type ProviderErrorOptions,
  type ProviderFailure,
} from '../provider-errors.js';

export class LLMError extends ProviderError {
  constructor(
    message: string,
    failure: ProviderFailure = 'unknown',
    options: ProviderErrorOptions = {},
  ) {
    super(message, failure, options);
    this.name = 'LLMError';
  }
}

/**
 * Rejected before any request is sent
 */
export class LLMValidationError extends LLMError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message, 'invalid_input');
    this.name = 'LLMValidationError';
  }
}
