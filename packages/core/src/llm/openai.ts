// OpenAI LLM provider
import type { LLMCompletionOptions, LLMProvider } from '@graphweave/shared';
import OpenAI, { APIError } from 'openai';
import {
  classifyAPIError,
  parseRetryAfter,
  type ProviderFailure,
} from '../provider-errors.js';
import { LLMError, LLMValidationError } from './errors.js';

const FAILURE_MESSAGES: Partial<Record<ProviderFailure, string>> = {
  authentication: 'Invalid OpenAI API key',
  permission: 'OpenAI permission denied',
  rate_limit: 'OpenAI rate limit exceeded',
};

/**
 * OpenAI LLM provider implementation
 */
export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model = 'gpt-4o-mini',
  ) {
    if (!apiKey) {
      throw new LLMError('OpenAI API key is required', 'authentication');
    }
    this.client = new OpenAI({ apiKey });
  }

  /**
   * Generate a completion using OpenAI's chat API. An aborted signal
   * cancels the HTTP request.
   */
  async complete(options: LLMCompletionOptions): Promise<string> {
    this.validate(options);

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: options.prompt }],
          max_tokens: options.maxTokens,
          response_format:
            options.responseFormat === 'json'
              ? { type: 'json_object' }
              : { type: 'text' },
        },
        { signal: options.signal },
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError('No content in response', 'bad_response');
      }

      return content;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new LLMError('Completion aborted', 'aborted', {
          cause: error instanceof Error ? error : undefined,
        });
      }
      throw this.handleError(error);
    }
  }

  private validate(options: LLMCompletionOptions): void {
    if (!options.prompt || options.prompt.trim().length === 0) {
      throw new LLMValidationError('Prompt cannot be empty', 'prompt');
    }
    if (
      options.maxTokens !== undefined &&
      (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0)
    ) {
      throw new LLMValidationError(
        'maxTokens must be a positive integer',
        'maxTokens',
      );
    }
  }

  /**
   * Convert OpenAI errors to LLMError with a failure class
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof APIError) {
      const failure = classifyAPIError(error);
      const message =
        failure === 'model_not_found'
          ? `Model not found: ${this.model}`
          : (FAILURE_MESSAGES[failure] ?? (error.message || 'OpenAI API error'));
      return new LLMError(message, failure, {
        cause: error,
        status: error.status,
        retryAfterMs:
          failure === 'rate_limit' ? parseRetryAfter(error) : undefined,
      });
    }

    if (error instanceof Error) {
      return new LLMError(error.message, 'unknown', { cause: error });
    }

    return new LLMError(`Unknown error: ${String(error)}`);
  }
}
