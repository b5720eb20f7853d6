// graphweave core - knowledge graph construction and retrieval
export * from './agents/index.js';
export * from './embeddings/index.js';
export * from './executor/index.js';
export * from './graphs/index.js';
export * from './llm/index.js';
export {
  isRetryableError,
  ProviderError,
  type ProviderErrorOptions,
  type ProviderFailure,
} from './provider-errors.js';
export * from './retrieval/index.js';
export * from './storage/index.js';
export {
  KnowledgeGraphIndex,
  textChunkId,
  type IndexStatistics,
  type KnowledgeGraphIndexOptions,
} from './knowledge-graph-index.js';

export const VERSION = '0.1.0';
