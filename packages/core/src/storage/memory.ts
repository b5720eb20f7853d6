// In-process graph store, used for the `memory` backend and in tests
import type {
  ConnectionState,
  Entity,
  GraphStatistics,
  Relationship,
  RelationshipType,
} from '@graphweave/shared';
import { cosineSimilarity } from '../graphs/similarity.js';
import type {
  GraphStore,
  GraphTransaction,
  SimilarEntity,
  StagedChanges,
} from './interface.js';
import { StagedTransaction } from './staged-transaction.js';

export class InMemoryGraphStore implements GraphStore {
  private readonly entities = new Map<string, Entity>();
  private readonly aliases = new Map<string, string>();
  private readonly relationships = new Map<string, Relationship>();
  private connectionState: ConnectionState = 'disconnected';

  async connect(): Promise<void> {
    this.connectionState = 'connected';
  }

  async disconnect(): Promise<void> {
    this.connectionState = 'disconnected';
  }

  async healthCheck(): Promise<boolean> {
    return this.connectionState === 'connected';
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  async transaction<T>(fn: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    const tx = new StagedTransaction(this);
    let result: T;
    try {
      result = await fn(tx);
    } catch (error) {
      tx.discard();
      throw error;
    }
    // No await between drain and apply: readers see all or nothing
    this.apply(tx.drain());
    return result;
  }

  async lookupByCanonicalId(canonicalId: string): Promise<Entity | null> {
    const direct = this.entities.get(canonicalId);
    if (direct) return direct;
    const owner = this.aliases.get(canonicalId);
    return owner ? (this.entities.get(owner) ?? null) : null;
  }

  async lookupBySimilarity(
    vector: number[],
    threshold: number,
    limit?: number,
  ): Promise<SimilarEntity[]> {
    const matches: SimilarEntity[] = [];
    for (const entity of this.entities.values()) {
      if (!entity.embedding) continue;
      const similarity = cosineSimilarity(vector, entity.embedding);
      if (similarity >= threshold) {
        matches.push({ entity, similarity });
      }
    }
    matches.sort(
      (a, b) =>
        b.similarity - a.similarity ||
        a.entity.canonical_id.localeCompare(b.entity.canonical_id),
    );
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  async listRelationships(chunkId: string): Promise<Relationship[]> {
    return [...this.relationships.values()].filter(
      (rel) => rel.chunk_id === chunkId,
    );
  }

  async countOutgoingEdges(entityId: string): Promise<number> {
    return (await this.listOutgoingEdges(entityId)).length;
  }

  async listOutgoingEdges(entityId: string): Promise<Relationship[]> {
    return [...this.relationships.values()].filter(
      (rel) => rel.source_entity_id === entityId,
    );
  }

  async findRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
  ): Promise<Relationship | null> {
    for (const rel of this.relationships.values()) {
      if (
        rel.source_entity_id === sourceId &&
        rel.target_entity_id === targetId &&
        rel.relationship_type === type
      ) {
        return rel;
      }
    }
    return null;
  }

  async getEntities(canonicalIds: string[]): Promise<Entity[]> {
    const found: Entity[] = [];
    for (const id of new Set(canonicalIds)) {
      const entity = this.entities.get(id);
      if (entity) found.push(entity);
    }
    return found;
  }

  async getIncidentRelationships(entityIds: string[]): Promise<Relationship[]> {
    const ids = new Set(entityIds);
    return [...this.relationships.values()].filter(
      (rel) => ids.has(rel.source_entity_id) || ids.has(rel.target_entity_id),
    );
  }

  async getStatistics(): Promise<GraphStatistics> {
    const chunks = new Set<string>();
    const relationshipTypes: Record<string, number> = {};
    for (const rel of this.relationships.values()) {
      chunks.add(rel.chunk_id);
      relationshipTypes[rel.relationship_type] =
        (relationshipTypes[rel.relationship_type] ?? 0) + 1;
    }
    return {
      entities: this.entities.size,
      relationships: this.relationships.size,
      chunks: chunks.size,
      relationshipTypes,
    };
  }

  async clear(): Promise<void> {
    this.entities.clear();
    this.aliases.clear();
    this.relationships.clear();
  }

  private apply(changes: StagedChanges): void {
    for (const entity of changes.entities) {
      this.entities.set(entity.canonical_id, entity);
      for (const alias of entity.alias_ids) {
        this.aliases.set(alias, entity.canonical_id);
      }
    }
    for (const rel of changes.relationships) {
      this.relationships.set(rel.id, rel);
    }
    for (const id of changes.deletedRelationshipIds) {
      this.relationships.delete(id);
    }
  }
}
