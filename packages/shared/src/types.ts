// Core type definitions for graphweave
import type {
  GraphFragmentInput,
  Metadata,
  RelationshipType,
} from './schemas.js';

// Knowledge Graph Types
export interface Entity {
  canonical_id: string;
  name: string;
  description: string;
  entity_type: string;
  metadata: Metadata;
  source_chunk_ids: string[];
  /** Canonical ids of candidates merged into this entity by similarity */
  alias_ids: string[];
  embedding?: number[];
}

export interface Relationship {
  id: string;
  source_entity_id: string;
  target_entity_id: string;
  description: string;
  relationship_type: RelationshipType;
  confidence: number;
  weight: number;
  chunk_id: string;
  metadata: Metadata;
}

// Ingestion results
export type ChunkFailureKind = 'extraction' | 'timeout' | 'storage';

export interface ChunkSummary {
  entities: number;
  relationships: number;
  mirrored: number;
  evicted: number;
}

export type ChunkResult =
  | { chunk_id: string; status: 'processed'; summary: ChunkSummary }
  | { chunk_id: string; status: 'skipped'; reason: 'already_processed' }
  | {
      chunk_id: string;
      status: 'failed';
      kind: ChunkFailureKind;
      message: string;
      /** Resubmitting the chunk unchanged may succeed */
      retryable: boolean;
    };

// Retrieval results
export type MetadataFilterValue = string | number | boolean;
export type MetadataFilters = Record<string, MetadataFilterValue>;

export interface ScoredEntity {
  entity: Entity;
  score: number;
  /** Hops from the nearest seed along the best-scoring path */
  depth: number;
}

export interface ScoredRelationship {
  relationship: Relationship;
  score: number;
}

export interface RetrievedKnowledgeGraph {
  query: string;
  entities: ScoredEntity[];
  relationships: ScoredRelationship[];
}

// LLM Provider Types
export interface LLMCompletionOptions {
  prompt: string;
  responseFormat?: 'text' | 'json';
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  complete(options: LLMCompletionOptions): Promise<string>;
}

// Embedding Provider Types
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

// Extraction collaborator. Implementations may be slow, non-deterministic
// and return malformed fragments; callers validate what comes back.
export interface ExtractOptions {
  signal?: AbortSignal;
}

export interface GraphExtractor {
  extract(text: string, options?: ExtractOptions): Promise<GraphFragmentInput>;
}

// Logging. `console` satisfies this interface.
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
