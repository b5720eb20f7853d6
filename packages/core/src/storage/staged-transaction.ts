// Write-staging overlay used by every GraphStore implementation
import type {
  Entity,
  Relationship,
  RelationshipType,
} from '@graphweave/shared';
import { cosineSimilarity } from '../graphs/similarity.js';
import { TransactionStateError } from './errors.js';
import type {
  GraphReader,
  GraphTransaction,
  SimilarEntity,
  StagedChanges,
} from './interface.js';

/**
 * Transaction that records writes in memory and answers reads from the
 * staged state layered over the committed graph.
 */
export class StagedTransaction implements GraphTransaction {
  private readonly entities = new Map<string, Entity>();
  private readonly relationships = new Map<string, Relationship>();
  private readonly deleted = new Set<string>();
  private closed = false;

  constructor(private readonly base: GraphReader) {}

  upsertEntity(entity: Entity): void {
    this.assertOpen();
    this.entities.set(entity.canonical_id, entity);
  }

  upsertRelationship(relationship: Relationship): void {
    this.assertOpen();
    this.deleted.delete(relationship.id);
    this.relationships.set(relationship.id, relationship);
  }

  deleteEdges(relationshipIds: string[]): void {
    this.assertOpen();
    for (const id of relationshipIds) {
      this.relationships.delete(id);
      this.deleted.add(id);
    }
  }

  async lookupByCanonicalId(canonicalId: string): Promise<Entity | null> {
    const staged = this.findStagedEntity(canonicalId);
    if (staged) return staged;

    const committed = await this.base.lookupByCanonicalId(canonicalId);
    if (!committed) return null;
    return this.entities.get(committed.canonical_id) ?? committed;
  }

  async lookupBySimilarity(
    vector: number[],
    threshold: number,
    limit?: number,
  ): Promise<SimilarEntity[]> {
    const byId = new Map<string, SimilarEntity>();

    for (const match of await this.base.lookupBySimilarity(vector, threshold)) {
      const entity =
        this.entities.get(match.entity.canonical_id) ?? match.entity;
      byId.set(entity.canonical_id, { entity, similarity: match.similarity });
    }

    for (const entity of this.entities.values()) {
      if (!entity.embedding) continue;
      const similarity = cosineSimilarity(vector, entity.embedding);
      if (similarity >= threshold) {
        byId.set(entity.canonical_id, { entity, similarity });
      }
    }

    const ranked = [...byId.values()].sort(
      (a, b) =>
        b.similarity - a.similarity ||
        a.entity.canonical_id.localeCompare(b.entity.canonical_id),
    );
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  async listRelationships(chunkId: string): Promise<Relationship[]> {
    return this.overlay(
      await this.base.listRelationships(chunkId),
      (rel) => rel.chunk_id === chunkId,
    );
  }

  async countOutgoingEdges(entityId: string): Promise<number> {
    return (await this.listOutgoingEdges(entityId)).length;
  }

  async listOutgoingEdges(entityId: string): Promise<Relationship[]> {
    return this.overlay(
      await this.base.listOutgoingEdges(entityId),
      (rel) => rel.source_entity_id === entityId,
    );
  }

  async findRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
  ): Promise<Relationship | null> {
    const matches = (rel: Relationship): boolean =>
      rel.source_entity_id === sourceId &&
      rel.target_entity_id === targetId &&
      rel.relationship_type === type;

    for (const rel of this.relationships.values()) {
      if (matches(rel)) return rel;
    }

    const outgoing = await this.base.listOutgoingEdges(sourceId);
    return (
      outgoing.find((rel) => matches(rel) && !this.deleted.has(rel.id)) ?? null
    );
  }

  async getEntities(canonicalIds: string[]): Promise<Entity[]> {
    const committed = await this.base.getEntities(canonicalIds);
    const byId = new Map(committed.map((e) => [e.canonical_id, e]));
    for (const id of canonicalIds) {
      const staged = this.entities.get(id);
      if (staged) byId.set(id, staged);
    }
    return [...byId.values()];
  }

  async getIncidentRelationships(entityIds: string[]): Promise<Relationship[]> {
    const ids = new Set(entityIds);
    return this.overlay(
      await this.base.getIncidentRelationships(entityIds),
      (rel) => ids.has(rel.source_entity_id) || ids.has(rel.target_entity_id),
    );
  }

  /**
   * Close the transaction and hand its writes to the store
   */
  drain(): StagedChanges {
    this.assertOpen();
    this.closed = true;
    return {
      entities: [...this.entities.values()],
      relationships: [...this.relationships.values()],
      deletedRelationshipIds: [...this.deleted],
    };
  }

  /**
   * Close without producing changes (fn threw)
   */
  discard(): void {
    this.closed = true;
  }

  private findStagedEntity(canonicalId: string): Entity | undefined {
    const direct = this.entities.get(canonicalId);
    if (direct) return direct;
    for (const entity of this.entities.values()) {
      if (entity.alias_ids.includes(canonicalId)) return entity;
    }
    return undefined;
  }

  // Committed rows minus deletions, with staged rows matching the predicate
  private overlay(
    committed: Relationship[],
    predicate: (rel: Relationship) => boolean,
  ): Relationship[] {
    const byId = new Map<string, Relationship>();
    for (const rel of committed) {
      if (!this.deleted.has(rel.id)) byId.set(rel.id, rel);
    }
    for (const rel of this.relationships.values()) {
      if (predicate(rel)) byId.set(rel.id, rel);
    }
    return [...byId.values()];
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TransactionStateError('Transaction is already closed');
    }
  }
}
