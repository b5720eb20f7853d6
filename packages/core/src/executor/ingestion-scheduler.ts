/**
 * IngestionScheduler - runs extraction and graph mutation for a batch of
 * chunks, in parallel or sequentially, and reports one result per chunk
 * in request order.
 *
 * Per chunk: idempotency pre-check, extraction, gate apply, all under the
 * chunk timeout. A chunk failure never affects its siblings.
 */
import {
  type Chunk,
  type ChunkResult,
  type GraphExtractor,
  getWorkerCount,
  IngestionRequestSchema,
  isFeatureEnabled,
  type KnowledgeGraphConfig,
  type Logger,
} from '@graphweave/shared';
import { FragmentValidationError } from '../graphs/errors.js';
import { isRetryableError } from '../provider-errors.js';
import type {
  ApplyResult,
  GraphMutationGate,
} from '../graphs/mutation-gate.js';
import type { GraphReader } from '../storage/interface.js';
import {
  ChunkError,
  ChunkExtractionError,
  ChunkStorageError,
  ChunkTimeoutError,
  describeError,
  SchedulerValidationError,
} from './errors.js';
import { WorkerPool } from './worker-pool.js';

export interface IngestionSchedulerOptions {
  config: KnowledgeGraphConfig;
  extractor: GraphExtractor;
  gate: GraphMutationGate;
  /** Read side used for the pre-extraction idempotency check */
  store: GraphReader;
  logger?: Logger;
}

export class IngestionScheduler {
  private readonly config: KnowledgeGraphConfig;
  private readonly extractor: GraphExtractor;
  private readonly gate: GraphMutationGate;
  private readonly store: GraphReader;
  private readonly logger: Logger;

  constructor(options: IngestionSchedulerOptions) {
    this.config = options.config;
    this.extractor = options.extractor;
    this.gate = options.gate;
    this.store = options.store;
    this.logger = options.logger ?? console;
  }

  /**
   * Process a batch of chunks.
   *
   * @param maxParallelism - upper bound on chunks in flight for this call
   * @throws SchedulerValidationError if the request is malformed; no chunk
   *   is processed in that case
   */
  async process(
    chunks: readonly Chunk[],
    maxParallelism?: number,
  ): Promise<ChunkResult[]> {
    const request = IngestionRequestSchema.safeParse({ chunks, maxParallelism });
    if (!request.success) {
      const errors = request.error.issues.map(
        (e) => `${e.path.join('.')}: ${e.message}`,
      );
      throw new SchedulerValidationError(
        `Invalid ingestion request: ${errors.join(', ')}`,
        errors,
      );
    }

    const batch = request.data.chunks;
    if (batch.length === 0) {
      return [];
    }

    const workers = this.workerCount(batch.length, request.data.maxParallelism);
    this.logger.info(
      `Processing ${batch.length} chunks ${workers > 1 ? `with ${workers} workers` : 'sequentially'}`,
    );

    const startedAt = Date.now();
    let completed = 0;
    const results = await WorkerPool.scoped(workers, (pool) =>
      pool.map(batch, async (chunk) => {
        const result = await this.processChunk(chunk);
        completed++;
        if (
          completed % this.config.progressInterval === 0 &&
          completed < batch.length
        ) {
          this.logger.info(`Processed ${completed}/${batch.length} chunks`);
        }
        return result;
      }),
    );

    const failed = results.filter((r) => r.status === 'failed').length;
    const skipped = results.filter((r) => r.status === 'skipped').length;
    this.logger.info(
      `Processed ${batch.length} chunks in ${Date.now() - startedAt}ms: ${batch.length - failed - skipped} processed, ${skipped} skipped, ${failed} failed`,
    );

    return results;
  }

  /**
   * Parallel only when the feature is on and there is something to share
   */
  private workerCount(chunkCount: number, maxParallelism?: number): number {
    if (!isFeatureEnabled(this.config, 'parallel_processing')) {
      return 1;
    }
    return Math.max(
      1,
      Math.min(
        getWorkerCount(this.config),
        maxParallelism ?? Number.POSITIVE_INFINITY,
        chunkCount,
      ),
    );
  }

  /**
   * Never rejects: every outcome becomes a ChunkResult
   */
  private async processChunk(chunk: Chunk): Promise<ChunkResult> {
    const timeoutMs = this.config.chunkTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ChunkTimeoutError(chunk.id, timeoutMs));
      }, timeoutMs);
    });

    const work = this.runChunk(chunk, controller.signal);
    // An abandoned chunk may still settle after its timeout
    void work.then(
      () => {
        if (controller.signal.aborted) {
          this.logger.debug(`Discarded late result for chunk ${chunk.id}`);
        }
      },
      (error: unknown) => {
        if (controller.signal.aborted) {
          this.logger.debug(
            `Discarded late failure for chunk ${chunk.id}: ${describeError(error)}`,
          );
        }
      },
    );

    try {
      return await Promise.race([work, timeout]);
    } catch (error) {
      return this.toFailure(chunk.id, error);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runChunk(
    chunk: Chunk,
    signal: AbortSignal,
  ): Promise<ChunkResult> {
    if (await this.isProcessed(chunk.id)) {
      this.logger.debug(`Skipping already processed chunk ${chunk.id}`);
      return { chunk_id: chunk.id, status: 'skipped', reason: 'already_processed' };
    }

    let fragment: unknown;
    try {
      fragment = await this.extractor.extract(chunk.text, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new ChunkTimeoutError(chunk.id, this.config.chunkTimeoutMs);
      }
      throw new ChunkExtractionError(
        `Extraction failed for chunk ${chunk.id}`,
        chunk.id,
        error instanceof Error ? error : undefined,
      );
    }

    // Timed out while extracting: the result must not reach the graph
    if (signal.aborted) {
      throw new ChunkTimeoutError(chunk.id, this.config.chunkTimeoutMs);
    }

    let applied: ApplyResult;
    try {
      applied = await this.gate.apply(chunk.id, fragment);
    } catch (error) {
      if (error instanceof FragmentValidationError) {
        throw new ChunkExtractionError(
          `Extractor returned a malformed fragment for chunk ${chunk.id}`,
          chunk.id,
          error,
        );
      }
      throw new ChunkStorageError(
        `Failed to apply graph fragment for chunk ${chunk.id}`,
        chunk.id,
        error instanceof Error ? error : undefined,
      );
    }

    if (applied.status === 'already_processed') {
      return { chunk_id: chunk.id, status: 'skipped', reason: 'already_processed' };
    }

    return {
      chunk_id: chunk.id,
      status: 'processed',
      summary: {
        entities: applied.entities.length,
        relationships: applied.relationships.length,
        mirrored: applied.mirrored,
        evicted: applied.evicted.length,
      },
    };
  }

  private async isProcessed(chunkId: string): Promise<boolean> {
    try {
      return (await this.store.listRelationships(chunkId)).length > 0;
    } catch (error) {
      throw new ChunkStorageError(
        `Idempotency check failed for chunk ${chunkId}`,
        chunkId,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private toFailure(chunkId: string, error: unknown): ChunkResult {
    const kind = error instanceof ChunkError ? error.kind : 'storage';
    const message = describeError(error);
    const retryable = kind === 'timeout' || isRetryableError(error);
    this.logger.warn(`Chunk ${chunkId} failed (${kind}): ${message}`);
    return { chunk_id: chunkId, status: 'failed', kind, message, retryable };
  }
}
