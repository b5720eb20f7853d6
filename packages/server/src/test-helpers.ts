// Shared fixtures for server tests
import { InMemoryGraphStore, LLMError } from '@graphweave/core';
import {
  DEFAULT_CONFIG,
  type EmbeddingProvider,
  type GraphExtractor,
  type GraphFragmentInput,
  type GraphweaveConfig,
  KnowledgeGraphConfigSchema,
  type Logger,
} from '@graphweave/shared';
import { vi } from 'vitest';
import { SharedResources } from './shared-resources.js';

export const RAFT_TEXT = 'Raft is a consensus algorithm.';

export const TEST_CONFIG: GraphweaveConfig = {
  ...DEFAULT_CONFIG,
  llm: {
    ...DEFAULT_CONFIG.llm,
    apiKey: 'test-secret',
  },
  knowledgeGraph: KnowledgeGraphConfigSchema.parse({
    enableEnhancedKg: true,
    maxWorkers: 2,
  }),
  storage: { backend: 'memory' },
};

/**
 * Extracts Raft -> Consensus from RAFT_TEXT, nothing from anything else,
 * and fails on text starting with "fail", or with a rate limit on text
 * starting with "busy"
 */
export class FixedExtractor implements GraphExtractor {
  async extract(text: string): Promise<GraphFragmentInput> {
    if (text.startsWith('fail')) {
      throw new Error('model unavailable');
    }
    if (text.startsWith('busy')) {
      throw new LLMError('OpenAI rate limit exceeded', 'rate_limit');
    }
    if (text !== RAFT_TEXT) {
      return { entities: [], relationships: [] };
    }
    return {
      entities: [
        { name: 'Raft', entity_type: 'algorithm' },
        { name: 'Consensus' },
      ],
      relationships: [
        {
          source_entity_name: 'Raft',
          target_entity_name: 'Consensus',
          relationship_type: 'hyponym',
          confidence: 1,
        },
      ],
    };
  }
}

const VECTORS: Record<string, number[]> = {
  Raft: [1, 0, 0],
  Consensus: [0, 1, 0],
  'raft query': [1, 0, 0],
};

/**
 * Fixed vectors; unknown text embeds to zero, "explode" throws
 */
export class FixedEmbeddings implements EmbeddingProvider {
  async embed(text: string): Promise<number[]> {
    if (text === 'explode') {
      throw new Error('embedding service down');
    }
    return VECTORS[text] ?? [0, 0, 0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * SharedResources on an in-memory store with fixed collaborators
 */
export function createTestResources(
  store = new InMemoryGraphStore(),
): SharedResources {
  return new SharedResources(TEST_CONFIG, {
    store,
    extractor: new FixedExtractor(),
    embeddings: new FixedEmbeddings(),
    logger: createMockLogger(),
  });
}
