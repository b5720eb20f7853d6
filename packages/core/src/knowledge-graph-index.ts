// KnowledgeGraphIndex - entry point wiring ingestion and retrieval over one store
import { createHash } from 'node:crypto';
import type {
  Chunk,
  ChunkResult,
  EmbeddingProvider,
  GraphExtractor,
  GraphStatistics,
  KnowledgeGraphConfig,
  Logger,
  MetadataFilters,
  RetrievalConfig,
  RetrievedKnowledgeGraph,
} from '@graphweave/shared';
import { IngestionError } from './executor/errors.js';
import { IngestionScheduler } from './executor/ingestion-scheduler.js';
import { KeyedLock } from './graphs/keyed-lock.js';
import { GraphMutationGate } from './graphs/mutation-gate.js';
import { WeightedRetriever } from './retrieval/weighted-retriever.js';
import type { GraphStore } from './storage/interface.js';

export interface KnowledgeGraphIndexOptions {
  store: GraphStore;
  extractor: GraphExtractor;
  embeddings: EmbeddingProvider;
  knowledgeGraph: KnowledgeGraphConfig;
  retrieval: RetrievalConfig;
  logger?: Logger;
}

export interface IndexStatistics extends GraphStatistics {
  /** Share of relationships with a type other than `generic` */
  typedCoverage: number;
  edgeToNodeRatio: number;
}

/**
 * Chunk id for free text: a digest of the text, so re-adding it is a no-op
 */
export function textChunkId(text: string): string {
  return `text:${createHash('sha256').update(text).digest('hex').slice(0, 16)}`;
}

export class KnowledgeGraphIndex {
  readonly store: GraphStore;
  private readonly scheduler: IngestionScheduler;
  private readonly retriever: WeightedRetriever;
  private readonly logger: Logger;

  constructor(options: KnowledgeGraphIndexOptions) {
    this.store = options.store;
    this.logger = options.logger ?? console;

    const gate = new GraphMutationGate({
      config: options.knowledgeGraph,
      store: options.store,
      embeddings: options.embeddings,
      logger: this.logger,
      lock: new KeyedLock(),
    });
    this.scheduler = new IngestionScheduler({
      config: options.knowledgeGraph,
      extractor: options.extractor,
      gate,
      store: options.store,
      logger: this.logger,
    });
    this.retriever = new WeightedRetriever({
      store: options.store,
      embeddings: options.embeddings,
      config: options.knowledgeGraph,
      retrieval: options.retrieval,
      logger: this.logger,
    });
  }

  async addText(text: string): Promise<ChunkResult> {
    return this.addChunk({ id: textChunkId(text), text });
  }

  async addChunk(chunk: Chunk): Promise<ChunkResult> {
    const [result] = await this.scheduler.process([chunk]);
    if (!result) {
      throw new IngestionError(`No result for chunk ${chunk.id}`);
    }
    return result;
  }

  /**
   * @throws SchedulerValidationError for a malformed batch
   */
  async addChunks(
    chunks: readonly Chunk[],
    maxParallelism?: number,
  ): Promise<ChunkResult[]> {
    return this.scheduler.process(chunks, maxParallelism);
  }

  async retrieve(
    query: string,
    depth?: number,
    filters?: MetadataFilters,
  ): Promise<RetrievedKnowledgeGraph> {
    return this.retriever.retrieve(query, depth, filters);
  }

  async getStatistics(): Promise<IndexStatistics> {
    const stats = await this.store.getStatistics();
    const generic = stats.relationshipTypes.generic ?? 0;
    return {
      ...stats,
      typedCoverage:
        stats.relationships === 0
          ? 0
          : (stats.relationships - generic) / stats.relationships,
      edgeToNodeRatio:
        stats.entities === 0 ? 0 : stats.relationships / stats.entities,
    };
  }

  async reset(): Promise<void> {
    await this.store.clear();
    this.logger.info('Knowledge graph cleared');
  }
}
