// SharedResources - holds the store, providers and index shared by every request
import {
  createEmbeddingProvider,
  createLLMProvider,
  FalkorDBGraphStore,
  type GraphStore,
  InMemoryGraphStore,
  KnowledgeGraphIndex,
  LLMGraphExtractor,
  StorageConfigError,
} from '@graphweave/core';
import {
  type EmbeddingProvider,
  type GraphExtractor,
  type GraphweaveConfig,
  GraphweaveConfigSchema,
  type HealthStatus,
  type Logger,
} from '@graphweave/shared';
import {
  ServerConfigError,
  ServerStartError,
  ServerStopError,
} from './errors.js';
import { HealthChecker } from './health.js';

/**
 * Components that replace the ones built from configuration
 */
export interface SharedResourcesOverrides {
  store?: GraphStore;
  extractor?: GraphExtractor;
  embeddings?: EmbeddingProvider;
  logger?: Logger;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SharedResources holds expensive, reusable resources that are shared across
 * all MCP requests: the graph store, the LLM extractor, the embedding
 * provider and the knowledge graph index built on them.
 */
export class SharedResources {
  readonly store: GraphStore;
  readonly extractor: GraphExtractor;
  readonly embeddingProvider: EmbeddingProvider;
  readonly index: KnowledgeGraphIndex;
  readonly healthChecker: HealthChecker;
  private readonly validatedConfig: GraphweaveConfig;
  private _isConnected = false;

  /**
   * Create a new SharedResources instance
   * @throws {ServerConfigError} if configuration is invalid
   */
  constructor(
    config: GraphweaveConfig,
    overrides: SharedResourcesOverrides = {},
  ) {
    const configResult = GraphweaveConfigSchema.safeParse(config);
    if (!configResult.success) {
      throw new ServerConfigError(
        `Invalid configuration:\n${configResult.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
        undefined,
      );
    }
    this.validatedConfig = configResult.data;

    this.store = overrides.store ?? this.createStore();
    this.extractor = overrides.extractor ?? this.createExtractor();
    this.embeddingProvider = overrides.embeddings ?? this.createEmbeddings();

    this.index = new KnowledgeGraphIndex({
      store: this.store,
      extractor: this.extractor,
      embeddings: this.embeddingProvider,
      knowledgeGraph: this.validatedConfig.knowledgeGraph,
      retrieval: this.validatedConfig.retrieval,
      logger: overrides.logger,
    });

    this.healthChecker = new HealthChecker(
      this.store,
      this.validatedConfig.storage.backend,
    );
  }

  private createStore(): GraphStore {
    if (this.validatedConfig.storage.backend === 'memory') {
      return new InMemoryGraphStore();
    }

    try {
      const { entityCacheSize, enableCacheWarmup } =
        this.validatedConfig.knowledgeGraph;
      return new FalkorDBGraphStore(this.validatedConfig.falkordb, {
        entityCacheSize,
        warmCache: enableCacheWarmup,
      });
    } catch (error) {
      if (error instanceof StorageConfigError) {
        throw new ServerConfigError(
          `FalkorDB configuration error: ${error.message}`,
          'falkordb',
          error,
        );
      }
      throw new ServerConfigError(
        `Failed to initialize FalkorDB store: ${describe(error)}`,
        'falkordb',
        error instanceof Error ? error : undefined,
      );
    }
  }

  private createExtractor(): GraphExtractor {
    try {
      return new LLMGraphExtractor(createLLMProvider(this.validatedConfig.llm), {
        maxTokens: this.validatedConfig.llm.extractionMaxTokens,
      });
    } catch (error) {
      throw new ServerConfigError(
        `LLM provider initialization failed: ${describe(error)}`,
        'llm',
        error instanceof Error ? error : undefined,
      );
    }
  }

  private createEmbeddings(): EmbeddingProvider {
    try {
      return createEmbeddingProvider(
        this.validatedConfig.embeddings,
        this.validatedConfig.llm.apiKey,
      );
    } catch (error) {
      throw new ServerConfigError(
        `Embedding provider initialization failed: ${describe(error)}`,
        'embeddings',
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Connect to the graph store
   * @throws {ServerStartError} if connection fails
   */
  async start(): Promise<void> {
    if (this._isConnected) {
      return;
    }

    try {
      await this.store.connect();
      this._isConnected = true;
    } catch (error) {
      throw new ServerStartError(
        `Failed to connect to ${this.validatedConfig.storage.backend} store: ${describe(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Disconnect and cleanup resources
   * @throws {ServerStopError} if shutdown fails
   */
  async stop(): Promise<void> {
    try {
      await this.store.disconnect();
    } catch (error) {
      throw new ServerStopError(
        `Errors during shutdown: ${describe(error)}`,
        error instanceof Error ? error : undefined,
      );
    } finally {
      this._isConnected = false;
    }
  }

  isConnected(): boolean {
    return this._isConnected;
  }

  async getHealth(): Promise<HealthStatus> {
    return this.healthChecker.check();
  }

  getConfig(): GraphweaveConfig {
    return this.validatedConfig;
  }
}
