/**
 * WeightedRetriever - query-time subgraph retrieval.
 *
 * Seeds come from embedding similarity against the query; scores then
 * spread outward over incident relationships in both directions, each hop
 * multiplying by the edge's normalized weight and the hop decay. An entity
 * keeps the score of its best path. Read-only: takes no locks.
 */
import {
  type EmbeddingProvider,
  type Entity,
  getSimilarityFloor,
  type KnowledgeGraphConfig,
  type Logger,
  type MetadataFilters,
  type Relationship,
  type RetrievalConfig,
  type RetrievedKnowledgeGraph,
  type ScoredEntity,
  type ScoredRelationship,
} from '@graphweave/shared';
import { z } from 'zod';
import { WEIGHT_SCALE } from '../graphs/relationship-typer.js';
import type { GraphReader } from '../storage/interface.js';
import {
  QueryEmbeddingError,
  RetrievalValidationError,
  TraversalError,
} from './errors.js';

const RetrieveRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  depth: z.number().int('depth must be an integer'),
  filters: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
    .optional(),
});

export interface WeightedRetrieverOptions {
  store: GraphReader;
  embeddings: EmbeddingProvider;
  config: KnowledgeGraphConfig;
  retrieval: RetrievalConfig;
  logger?: Logger;
}

interface Reach {
  score: number;
  depth: number;
}

/**
 * Value of a filter key on an entity; `entity_type` falls back to the
 * entity's own type
 */
function entityField(entity: Entity, key: string): unknown {
  if (key in entity.metadata) {
    return entity.metadata[key];
  }
  return key === 'entity_type' ? entity.entity_type : undefined;
}

/**
 * Seeds must satisfy every filter
 */
export function matchesFilters(
  entity: Entity,
  filters: MetadataFilters | undefined,
): boolean {
  if (!filters) return true;
  return Object.entries(filters).every(
    ([key, value]) => entityField(entity, key) === value,
  );
}

/**
 * Traversed items only need to not contradict a filter: a key they do not
 * carry passes
 */
function contradictsFilters(
  metadata: Record<string, unknown>,
  filters: MetadataFilters | undefined,
): boolean {
  if (!filters) return false;
  return Object.entries(filters).some(
    ([key, value]) => key in metadata && metadata[key] !== value,
  );
}

function byScoreThenId<T>(id: (item: T) => string, score: (item: T) => number) {
  return (a: T, b: T): number =>
    score(b) - score(a) || (id(a) < id(b) ? -1 : id(a) > id(b) ? 1 : 0);
}

export class WeightedRetriever {
  private readonly store: GraphReader;
  private readonly embeddings: EmbeddingProvider;
  private readonly retrieval: RetrievalConfig;
  private readonly seedThreshold: number;
  private readonly logger: Logger;

  constructor(options: WeightedRetrieverOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.retrieval = options.retrieval;
    this.seedThreshold =
      options.retrieval.seedThreshold ?? getSimilarityFloor(options.config);
    this.logger = options.logger ?? console;
  }

  /**
   * Retrieve the scored subgraph around a query.
   *
   * @param depth - maximum hops from a seed; `<= 0` returns the seeds only
   * @param filters - seeds must match every filter; traversal skips items
   *   whose metadata contradicts one
   */
  async retrieve(
    query: string,
    depth: number = this.retrieval.defaultDepth,
    filters?: MetadataFilters,
  ): Promise<RetrievedKnowledgeGraph> {
    const request = RetrieveRequestSchema.safeParse({ query, depth, filters });
    if (!request.success) {
      throw new RetrievalValidationError(
        'Invalid retrieval request',
        'WeightedRetriever',
        request.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }

    let vector: number[];
    try {
      vector = await this.embeddings.embed(request.data.query);
    } catch (error) {
      throw new QueryEmbeddingError(
        'Failed to embed retrieval query',
        query,
        error instanceof Error ? error : undefined,
      );
    }

    const seeds = await this.read(0, () =>
      this.store.lookupBySimilarity(
        vector,
        this.seedThreshold,
        this.retrieval.maxSeeds,
      ),
    );

    const reach = new Map<string, Reach>();
    const entities = new Map<string, Entity>();
    for (const { entity, similarity } of seeds) {
      if (matchesFilters(entity, filters)) {
        reach.set(entity.canonical_id, { score: similarity, depth: 0 });
        entities.set(entity.canonical_id, entity);
      }
    }

    if (reach.size === 0) {
      this.logger.debug(`No seeds above ${this.seedThreshold} for query`);
      return { query, entities: [], relationships: [] };
    }

    const traversed = new Map<string, Relationship>();
    let frontier = new Map(
      [...reach].map(([id, r]) => [id, r.score] as const),
    );

    for (let hop = 1; hop <= depth && frontier.size > 0; hop++) {
      const incident = await this.read(hop, () =>
        this.store.getIncidentRelationships([...frontier.keys()]),
      );

      const improved = new Map<string, number>();
      for (const rel of incident) {
        if (contradictsFilters(rel.metadata, filters)) continue;
        traversed.set(rel.id, rel);

        const factor = (rel.weight / WEIGHT_SCALE) * this.retrieval.hopDecay;
        const ends: [string, string][] = [
          [rel.source_entity_id, rel.target_entity_id],
          [rel.target_entity_id, rel.source_entity_id],
        ];
        for (const [from, to] of ends) {
          const origin = frontier.get(from);
          if (origin === undefined) continue;
          const candidate = origin * factor;
          const best = improved.get(to) ?? reach.get(to)?.score ?? 0;
          if (candidate > best) {
            improved.set(to, candidate);
          }
        }
      }

      const fresh = [...improved.keys()].filter((id) => !entities.has(id));
      for (const entity of await this.read(hop, () =>
        this.store.getEntities(fresh),
      )) {
        entities.set(entity.canonical_id, entity);
      }

      frontier = new Map<string, number>();
      for (const [id, score] of improved) {
        const entity = entities.get(id);
        if (!entity || contradictsFilters(entity.metadata, filters)) continue;
        reach.set(id, { score, depth: hop });
        frontier.set(id, score);
      }
    }

    const scoredEntities: ScoredEntity[] = [];
    for (const [id, { score, depth: hops }] of reach) {
      const entity = entities.get(id);
      if (entity) scoredEntities.push({ entity, score, depth: hops });
    }
    scoredEntities.sort(
      byScoreThenId<ScoredEntity>(
        (s) => s.entity.canonical_id,
        (s) => s.score,
      ),
    );

    const scoredRelationships: ScoredRelationship[] = [];
    for (const rel of traversed.values()) {
      const source = reach.get(rel.source_entity_id);
      const target = reach.get(rel.target_entity_id);
      if (!source || !target) continue;
      const factor = (rel.weight / WEIGHT_SCALE) * this.retrieval.hopDecay;
      scoredRelationships.push({
        relationship: rel,
        score: Math.max(source.score, target.score) * factor,
      });
    }
    scoredRelationships.sort(
      byScoreThenId<ScoredRelationship>(
        (s) => s.relationship.id,
        (s) => s.score,
      ),
    );

    return {
      query,
      entities: scoredEntities,
      relationships: scoredRelationships,
    };
  }

  private async read<T>(hop: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TraversalError(
        `Graph read failed at hop ${hop}`,
        hop,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
