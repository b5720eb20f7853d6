// Embedding provider abstraction
import type { EmbeddingProvider, EmbeddingsConfig } from '@graphweave/shared';
import { EmbeddingError } from './errors.js';
import { OpenAIEmbeddings } from './openai.js';

export { OpenAIEmbeddings } from './openai.js';

export { EmbeddingError } from './errors.js';

/**
 * Create an embedding provider based on configuration
 */
export function createEmbeddingProvider(
  config: EmbeddingsConfig,
  apiKey?: string,
): EmbeddingProvider {
  if (!apiKey) {
    throw new EmbeddingError(
      'OpenAI API key required for embeddings',
      'authentication',
    );
  }
  return new OpenAIEmbeddings(apiKey, config.model, config.dimensions);
}
