/**
 * Graph Mutation Gate - the only writer of entities and relationships.
 *
 * Applies one chunk's fragment atomically: idempotency check, entity
 * canonicalization and merge, relationship filtering and weighting,
 * symmetric mirroring and the per-entity edge cap.
 */
import { createHash } from 'node:crypto';
import {
  type CandidateEntity,
  CandidateEntitySchema,
  type CandidateRelationship,
  CandidateRelationshipSchema,
  type EmbeddingProvider,
  type Entity,
  isFeatureEnabled,
  type KnowledgeGraphConfig,
  type Logger,
  type Metadata,
  type Relationship,
  type RelationshipType,
} from '@graphweave/shared';
import { z } from 'zod';
import type { GraphStore, GraphTransaction } from '../storage/interface.js';
import { Canonicalizer, embeddingText } from './canonicalizer.js';
import { FragmentValidationError, MutationError } from './errors.js';
import { KeyedLock } from './keyed-lock.js';
import { RelationshipTyper } from './relationship-typer.js';

/** Lock key used when fuzzy merging can reach any entity */
export const GLOBAL_LOCK_KEY = '*';

const DEFAULT_ENTITY_TYPE = 'concept';

// Items are validated one at a time so one bad candidate does not sink the
// whole fragment
const FragmentEnvelopeSchema = z.object({
  entities: z.array(z.unknown()).default([]),
  relationships: z.array(z.unknown()).default([]),
});

export interface DroppedCounts {
  malformed: number;
  unresolved: number;
  lowConfidence: number;
}

export interface ApplyResult {
  chunkId: string;
  status: 'applied' | 'already_processed';
  /** Entities written by this call, after merging */
  entities: Entity[];
  /** Relationships from this call that survived the edge cap */
  relationships: Relationship[];
  mirrored: number;
  /** Ids of edges removed by the edge cap, from this or earlier chunks */
  evicted: string[];
  dropped: DroppedCounts;
}

export interface MutationGateOptions {
  config: KnowledgeGraphConfig;
  store: GraphStore;
  embeddings?: EmbeddingProvider;
  logger?: Logger;
  lock?: KeyedLock;
}

interface PreparedEntity {
  candidate: CandidateEntity;
  normalizedName: string;
  canonicalId: string;
}

/**
 * Deterministic relationship id, so re-extracting the same edge from the
 * same chunk cannot create a second row
 */
export function relationshipId(
  chunkId: string,
  sourceId: string,
  targetId: string,
  type: RelationshipType,
  description: string,
): string {
  return createHash('sha256')
    .update([chunkId, sourceId, targetId, type, description].join('\u0000'))
    .digest('hex')
    .slice(0, 16);
}

export class GraphMutationGate {
  private readonly config: KnowledgeGraphConfig;
  private readonly store: GraphStore;
  private readonly embeddings?: EmbeddingProvider;
  private readonly logger: Logger;
  private readonly lock: KeyedLock;
  private readonly canonicalizer: Canonicalizer;
  private readonly typer: RelationshipTyper;
  private readonly aliasTracking: boolean;

  constructor(options: MutationGateOptions) {
    this.config = options.config;
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.logger = options.logger ?? console;
    this.lock = options.lock ?? new KeyedLock();
    this.canonicalizer = new Canonicalizer(options.config, options.embeddings);
    this.typer = new RelationshipTyper(options.config);
    this.aliasTracking = isFeatureEnabled(options.config, 'alias_tracking');
  }

  /**
   * Apply a chunk's fragment. A chunk that already has relationships is a
   * no-op returning `already_processed`.
   *
   * @throws FragmentValidationError if the fragment is not an object of arrays
   * @throws MutationError if an embedding call fails
   * @throws StorageError if the store fails; nothing is written in that case
   */
  async apply(chunkId: string, fragment: unknown): Promise<ApplyResult> {
    const dropped: DroppedCounts = {
      malformed: 0,
      unresolved: 0,
      lowConfidence: 0,
    };

    // A processed chunk is a no-op whatever the fragment holds; the check is
    // repeated inside the transaction for racing applies
    const existing = await this.store.listRelationships(chunkId);
    if (existing.length > 0) {
      return this.alreadyProcessed(chunkId, existing.length, dropped);
    }

    const envelope = FragmentEnvelopeSchema.safeParse(fragment);
    if (!envelope.success) {
      throw new FragmentValidationError(
        `Malformed graph fragment for chunk ${chunkId}`,
        chunkId,
        envelope.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }

    const entities = this.prepareEntities(
      chunkId,
      envelope.data.entities,
      dropped,
    );
    const relationships = this.parseItems(
      chunkId,
      envelope.data.relationships,
      CandidateRelationshipSchema,
      dropped,
    );

    const keys = this.canonicalizer.fuzzyMatching
      ? [GLOBAL_LOCK_KEY]
      : [`chunk:${chunkId}`, ...entities.map((e) => e.canonicalId)];

    return this.lock.withKeys(keys, () =>
      this.store.transaction((tx) =>
        this.applyInTransaction(tx, chunkId, entities, relationships, dropped),
      ),
    );
  }

  private async applyInTransaction(
    tx: GraphTransaction,
    chunkId: string,
    entities: PreparedEntity[],
    candidates: CandidateRelationship[],
    dropped: DroppedCounts,
  ): Promise<ApplyResult> {
    const existing = await tx.listRelationships(chunkId);
    if (existing.length > 0) {
      return this.alreadyProcessed(chunkId, existing.length, dropped);
    }

    // normalized name -> canonical id of the stored entity
    const resolved = new Map<string, string>();
    const written = new Map<string, Entity>();
    for (const prepared of entities) {
      const entity = await this.upsertEntity(tx, chunkId, prepared);
      resolved.set(prepared.normalizedName, entity.canonical_id);
      written.set(entity.canonical_id, entity);
    }

    const accepted = new Map<string, Relationship>();
    const touched = new Set<string>();
    for (const candidate of candidates) {
      const rel = this.buildRelationship(chunkId, candidate, resolved, dropped);
      if (!rel) continue;
      tx.upsertRelationship(rel);
      accepted.set(rel.id, rel);
      touched.add(rel.source_entity_id);
    }

    // Mirrors are added before the cap so the cap also bounds them
    let mirrored = 0;
    for (const rel of [...accepted.values()]) {
      if (!this.typer.shouldMirror(rel.relationship_type)) continue;
      const inverse = await tx.findRelationship(
        rel.target_entity_id,
        rel.source_entity_id,
        rel.relationship_type,
      );
      if (inverse) continue;

      const mirror: Relationship = {
        ...rel,
        id: relationshipId(
          chunkId,
          rel.target_entity_id,
          rel.source_entity_id,
          rel.relationship_type,
          rel.description,
        ),
        source_entity_id: rel.target_entity_id,
        target_entity_id: rel.source_entity_id,
        metadata: { ...rel.metadata, mirrored_from: rel.id },
      };
      tx.upsertRelationship(mirror);
      accepted.set(mirror.id, mirror);
      touched.add(mirror.source_entity_id);
      mirrored++;
    }

    const evicted: string[] = [];
    for (const sourceId of touched) {
      evicted.push(...(await this.enforceEdgeCap(tx, chunkId, sourceId)));
    }
    for (const id of evicted) {
      accepted.delete(id);
    }

    this.logger.debug(
      `Chunk ${chunkId}: ${written.size} entities, ${accepted.size} relationships (${mirrored} mirrored, ${evicted.length} evicted)`,
    );

    return {
      chunkId,
      status: 'applied',
      entities: [...written.values()],
      relationships: [...accepted.values()],
      mirrored,
      evicted,
      dropped,
    };
  }

  private alreadyProcessed(
    chunkId: string,
    relationshipCount: number,
    dropped: DroppedCounts,
  ): ApplyResult {
    this.logger.debug(
      `Chunk ${chunkId} already processed (${relationshipCount} relationships)`,
    );
    return {
      chunkId,
      status: 'already_processed',
      entities: [],
      relationships: [],
      mirrored: 0,
      evicted: [],
      dropped,
    };
  }

  private prepareEntities(
    chunkId: string,
    items: unknown[],
    dropped: DroppedCounts,
  ): PreparedEntity[] {
    const prepared: PreparedEntity[] = [];
    for (const candidate of this.parseItems(
      chunkId,
      items,
      CandidateEntitySchema,
      dropped,
    )) {
      const normalizedName = this.canonicalizer.normalize(candidate.name);
      // Names made only of punctuation would all share one canonical id
      if (!normalizedName) {
        dropped.malformed++;
        this.logger.debug(
          `Chunk ${chunkId}: dropped entity "${candidate.name}" with an empty normalized name`,
        );
        continue;
      }
      prepared.push({
        candidate,
        normalizedName,
        canonicalId: this.canonicalizer.canonicalId(
          candidate.name,
          candidate.description,
        ),
      });
    }
    return prepared;
  }

  private parseItems<T>(
    chunkId: string,
    items: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    dropped: DroppedCounts,
  ): T[] {
    const parsed: T[] = [];
    for (const item of items) {
      const result = schema.safeParse(item);
      if (result.success) {
        parsed.push(result.data);
      } else {
        dropped.malformed++;
        this.logger.debug(
          `Chunk ${chunkId}: dropped malformed item: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        );
      }
    }
    return parsed;
  }

  private async upsertEntity(
    tx: GraphTransaction,
    chunkId: string,
    prepared: PreparedEntity,
  ): Promise<Entity> {
    const { candidate, canonicalId } = prepared;

    const exact = await tx.lookupByCanonicalId(canonicalId);
    if (exact) {
      const merged = this.mergeEntity(exact, candidate, chunkId);
      tx.upsertEntity(merged);
      return merged;
    }

    const embedding = await this.embed(chunkId, candidate);

    if (embedding && this.canonicalizer.fuzzyMatching) {
      const [match] = await tx.lookupBySimilarity(
        embedding,
        this.canonicalizer.similarityFloor,
        1,
      );
      if (
        match &&
        this.canonicalizer.shouldMerge(match.entity, {
          canonical_id: canonicalId,
          embedding,
        })
      ) {
        const merged = this.mergeEntity(match.entity, candidate, chunkId);
        if (this.aliasTracking && !merged.alias_ids.includes(canonicalId)) {
          merged.alias_ids = [...merged.alias_ids, canonicalId];
        }
        this.logger.debug(
          `Chunk ${chunkId}: merged "${candidate.name}" into ${match.entity.canonical_id} (similarity ${match.similarity.toFixed(3)})`,
        );
        tx.upsertEntity(merged);
        return merged;
      }
    }

    const entity: Entity = {
      canonical_id: canonicalId,
      name: candidate.name,
      description: candidate.description,
      entity_type: candidate.entity_type,
      metadata: { ...candidate.metadata },
      source_chunk_ids: [chunkId],
      alias_ids: [],
    };
    if (embedding) {
      entity.embedding = embedding;
    }
    tx.upsertEntity(entity);
    return entity;
  }

  /**
   * Union source chunks, keep the longer description and the existing name,
   * keep the existing type unless it is the default, metadata last-writer-wins
   */
  private mergeEntity(
    existing: Entity,
    candidate: CandidateEntity,
    chunkId: string,
  ): Entity {
    const metadata: Metadata = { ...existing.metadata };
    for (const [key, value] of Object.entries(candidate.metadata)) {
      if (key in metadata && metadata[key] !== value) {
        this.logger.debug(
          `Chunk ${chunkId}: metadata "${key}" on ${existing.canonical_id} overwritten`,
        );
      }
      metadata[key] = value;
    }

    const entityType =
      existing.entity_type === DEFAULT_ENTITY_TYPE || !existing.entity_type
        ? candidate.entity_type
        : existing.entity_type;

    return {
      ...existing,
      description:
        candidate.description.length > existing.description.length
          ? candidate.description
          : existing.description,
      entity_type: entityType,
      metadata,
      source_chunk_ids: existing.source_chunk_ids.includes(chunkId)
        ? existing.source_chunk_ids
        : [...existing.source_chunk_ids, chunkId],
    };
  }

  private buildRelationship(
    chunkId: string,
    candidate: CandidateRelationship,
    resolved: Map<string, string>,
    dropped: DroppedCounts,
  ): Relationship | null {
    const sourceId = resolved.get(
      this.canonicalizer.normalize(candidate.source_entity_name),
    );
    const targetId = resolved.get(
      this.canonicalizer.normalize(candidate.target_entity_name),
    );
    if (!sourceId || !targetId) {
      dropped.unresolved++;
      this.logger.debug(
        `Chunk ${chunkId}: dropped relationship "${candidate.source_entity_name}" -> "${candidate.target_entity_name}" with unresolved endpoint`,
      );
      return null;
    }

    if (candidate.confidence < this.config.minRelationshipConfidence) {
      dropped.lowConfidence++;
      this.logger.debug(
        `Chunk ${chunkId}: dropped relationship "${candidate.source_entity_name}" -> "${candidate.target_entity_name}" with confidence ${candidate.confidence}`,
      );
      return null;
    }

    const type = this.typer.resolveType(candidate.relationship_type);
    return {
      id: relationshipId(
        chunkId,
        sourceId,
        targetId,
        type,
        candidate.description,
      ),
      source_entity_id: sourceId,
      target_entity_id: targetId,
      description: candidate.description,
      relationship_type: type,
      confidence: candidate.confidence,
      weight: this.typer.weigh(type, candidate.confidence),
      chunk_id: chunkId,
      metadata: { ...candidate.metadata },
    };
  }

  /**
   * Evict lowest-weight edges (ties: lowest id) until the source is at the cap
   */
  private async enforceEdgeCap(
    tx: GraphTransaction,
    chunkId: string,
    sourceId: string,
  ): Promise<string[]> {
    const edges = await tx.listOutgoingEdges(sourceId);
    const excess = edges.length - this.config.maxEdgesPerEntity;
    if (excess <= 0) return [];

    const evicted = [...edges]
      .sort((a, b) => a.weight - b.weight || a.id.localeCompare(b.id))
      .slice(0, excess)
      .map((edge) => edge.id);
    tx.deleteEdges(evicted);

    this.logger.debug(
      `Chunk ${chunkId}: evicted ${evicted.length} edges from ${sourceId}`,
    );
    return evicted;
  }

  private async embed(
    chunkId: string,
    candidate: CandidateEntity,
  ): Promise<number[] | undefined> {
    if (!this.embeddings) return undefined;
    try {
      return await this.embeddings.embed(
        embeddingText(candidate.name, candidate.description),
      );
    } catch (error) {
      throw new MutationError(
        `Failed to embed entity "${candidate.name}" for chunk ${chunkId}`,
        chunkId,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
