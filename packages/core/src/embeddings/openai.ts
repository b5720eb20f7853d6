// OpenAI embeddings provider
import type { EmbeddingProvider } from '@graphweave/shared';
import OpenAI, { APIError } from 'openai';
import { classifyAPIError, parseRetryAfter } from '../provider-errors.js';
import { EmbeddingError } from './errors.js';

/**
 * OpenAI embeddings provider implementation
 */
export class OpenAIEmbeddings implements EmbeddingProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model = 'text-embedding-3-small',
    private dimensions?: number,
  ) {
    if (!apiKey) {
      throw new EmbeddingError('OpenAI API key is required', 'authentication');
    }
    this.client = new OpenAI({ apiKey });
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new EmbeddingError('Text cannot be empty', 'invalid_input');
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: text,
        dimensions: this.dimensions,
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new EmbeddingError('No embedding in response', 'bad_response');
      }

      return embedding;
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Generate embeddings for multiple texts in one request
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    if (texts.some((t) => t.trim().length === 0)) {
      throw new EmbeddingError('Batch contains empty text', 'invalid_input');
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });

      if (response.data.length !== texts.length) {
        throw new EmbeddingError(
          `Expected ${texts.length} embeddings, got ${response.data.length}`,
          'bad_response',
        );
      }

      // Sort by index to maintain order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      return sorted.map((item) => item.embedding);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Get the dimension of embeddings for this model
   */
  getDimension(): number {
    if (this.dimensions !== undefined) {
      return this.dimensions;
    }
    return this.model.includes('large') ? 3072 : 1536;
  }

  /**
   * Convert OpenAI errors to EmbeddingError with a failure class
   */
  private handleError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    if (error instanceof APIError) {
      const failure = classifyAPIError(error);
      const message =
        failure === 'model_not_found'
          ? `Embedding model not found: ${this.model}`
          : error.message || 'OpenAI API error';
      return new EmbeddingError(message, failure, {
        cause: error,
        status: error.status,
        retryAfterMs:
          failure === 'rate_limit' ? parseRetryAfter(error) : undefined,
      });
    }

    if (error instanceof Error) {
      return new EmbeddingError(error.message, 'unknown', { cause: error });
    }

    return new EmbeddingError(`Unknown error: ${String(error)}`);
  }
}
