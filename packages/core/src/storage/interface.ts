// Storage interface - abstracts the underlying graph database
import type {
  ConnectionState,
  Entity,
  GraphStatistics,
  Relationship,
  RelationshipType,
} from '@graphweave/shared';

export interface SimilarEntity {
  entity: Entity;
  similarity: number;
}

/**
 * Read side of the graph. Shared by stores and open transactions.
 */
export interface GraphReader {
  /** Exact lookup by canonical id or any recorded alias id */
  lookupByCanonicalId(canonicalId: string): Promise<Entity | null>;

  /**
   * Entities whose embedding has cosine similarity >= threshold with the
   * vector, most similar first.
   */
  lookupBySimilarity(
    vector: number[],
    threshold: number,
    limit?: number,
  ): Promise<SimilarEntity[]>;

  /** Relationships extracted from the given chunk */
  listRelationships(chunkId: string): Promise<Relationship[]>;

  countOutgoingEdges(entityId: string): Promise<number>;
  listOutgoingEdges(entityId: string): Promise<Relationship[]>;

  findRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
  ): Promise<Relationship | null>;

  getEntities(canonicalIds: string[]): Promise<Entity[]>;

  /** Relationships with either endpoint in the given set */
  getIncidentRelationships(entityIds: string[]): Promise<Relationship[]>;
}

/**
 * Staged writes. Nothing is visible to other readers until the owning
 * store commits the transaction.
 */
export interface GraphTransaction extends GraphReader {
  upsertEntity(entity: Entity): void;
  upsertRelationship(relationship: Relationship): void;
  deleteEdges(relationshipIds: string[]): void;
}

/**
 * Changes collected by a transaction, applied by the store in one step
 */
export interface StagedChanges {
  entities: Entity[];
  relationships: Relationship[];
  deletedRelationshipIds: string[];
}

/**
 * Graph store interface - implement this to support different databases
 */
export interface GraphStore extends GraphReader {
  // Connection management
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  getConnectionState(): ConnectionState;

  /**
   * Run fn against a staged transaction and commit its writes atomically.
   * Nothing is written if fn throws.
   */
  transaction<T>(fn: (tx: GraphTransaction) => Promise<T>): Promise<T>;

  // Utility operations
  getStatistics(): Promise<GraphStatistics>;
  clear(): Promise<void>;
}
