// Errors raised by embedding providers
import {
  ProviderError,
  type ProviderErrorOptions,
  type ProviderFailure,
} from '../provider-errors.js';

export class EmbeddingError extends ProviderError {
  constructor(
    message: string,
    failure: ProviderFailure = 'unknown',
    options: ProviderErrorOptions = {},
  ) {
    super(message, failure, options);
    this.name = 'EmbeddingError';
  }
}
