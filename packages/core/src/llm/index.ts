// LLM provider abstraction
import type { LLMConfig, LLMProvider } from '@graphweave/shared';
import { LLMError } from './errors.js';
import { OpenAIProvider } from './openai.js';

export { OpenAIProvider } from './openai.js';

export { LLMError, LLMValidationError } from './errors.js';

/**
 * Create an LLM provider based on configuration
 * @throws {LLMError} When the API key is missing
 */
export function createLLMProvider(config: LLMConfig): LLMProvider {
  if (!config.apiKey) {
    throw new LLMError('OpenAI API key required', 'authentication');
  }
  return new OpenAIProvider(config.apiKey, config.model);
}
