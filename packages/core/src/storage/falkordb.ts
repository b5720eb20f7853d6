// FalkorDB graph store - database connection and Cypher queries
import {
  type ConnectionState,
  type Entity,
  type FalkorDBConfig,
  type GraphStatistics,
  type Relationship,
  type RelationshipType,
  validateFalkorDBConfig,
} from '@graphweave/shared';
import { FalkorDB, type Graph } from 'falkordb';
import { z } from 'zod';
import { cosineSimilarity } from '../graphs/similarity.js';
import {
  ConnectionError,
  QueryError,
  StorageConfigError,
  StorageParseError,
} from './errors.js';
import { EntityCache } from './entity-cache.js';
import type {
  GraphStore,
  GraphTransaction,
  SimilarEntity,
  StagedChanges,
} from './interface.js';
import { parseEntityRow, parseRelationshipRow } from './parsers.js';
import { StagedTransaction } from './staged-transaction.js';

// FalkorDB query param types (internal)
type QueryParam = null | string | number | boolean | QueryParams | QueryParam[];
type QueryParams = { [key: string]: QueryParam };

const ENTITY_LABEL = 'KG_Entity';
const RELATIONSHIP_TYPE = 'KG_RELATES';

const ENTITY_RETURN = `n.canonical_id AS canonical_id, n.name AS name,
  n.description AS description, n.entity_type AS entity_type,
  n.metadata AS metadata, n.source_chunk_ids AS source_chunk_ids,
  n.alias_ids AS alias_ids, n.embedding AS embedding`;

const RELATIONSHIP_MATCH = `MATCH (a:${ENTITY_LABEL})-[r:${RELATIONSHIP_TYPE}]->(b:${ENTITY_LABEL})`;

const RELATIONSHIP_RETURN = `r.id AS id, a.canonical_id AS source,
  b.canonical_id AS target, r.description AS description,
  r.relationship_type AS relationship_type, r.confidence AS confidence,
  r.weight AS weight, r.chunk_id AS chunk_id, r.metadata AS metadata`;

// All staged writes go out as one query so a commit is applied atomically
const COMMIT_QUERY = `
UNWIND $entities AS e
MERGE (n:${ENTITY_LABEL} {canonical_id: e.canonical_id})
SET n.name = e.name, n.description = e.description,
    n.entity_type = e.entity_type, n.metadata = e.metadata,
    n.source_chunk_ids = e.source_chunk_ids, n.alias_ids = e.alias_ids,
    n.embedding = e.embedding
WITH count(*) AS written_entities
UNWIND $relationships AS rel
MATCH (a:${ENTITY_LABEL} {canonical_id: rel.source}),
      (b:${ENTITY_LABEL} {canonical_id: rel.target})
MERGE (a)-[r:${RELATIONSHIP_TYPE} {id: rel.id}]->(b)
SET r.description = rel.description,
    r.relationship_type = rel.relationship_type,
    r.confidence = rel.confidence, r.weight = rel.weight,
    r.chunk_id = rel.chunk_id, r.metadata = rel.metadata
WITH count(*) AS written_relationships
UNWIND $deleted AS deleted_id
MATCH ()-[d:${RELATIONSHIP_TYPE} {id: deleted_id}]->()
DELETE d`;

export const DEFAULT_ENTITY_CACHE_SIZE = 1000;

export interface FalkorDBStoreOptions {
  /** Entries kept for exact lookups; 0 disables the cache */
  entityCacheSize?: number;
  /** Load up to entityCacheSize entities when connecting */
  warmCache?: boolean;
}

const CountRowSchema = z.object({ count: z.number().int().min(0) });
const TypeCountRowSchema = z.object({
  type: z.string(),
  count: z.number().int().min(0),
});

/**
 * FalkorDB-backed graph store
 */
export class FalkorDBGraphStore implements GraphStore {
  private client: FalkorDB | null = null;
  private graph: Graph | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private readonly graphName: string;
  private readonly validatedConfig: FalkorDBConfig;
  private readonly entityCache: EntityCache;
  private readonly warmCache: boolean;

  /**
   * @throws StorageConfigError if configuration is invalid
   */
  constructor(config: FalkorDBConfig, options: FalkorDBStoreOptions = {}) {
    try {
      this.validatedConfig = validateFalkorDBConfig(config);
    } catch (error) {
      throw new StorageConfigError(
        `Invalid FalkorDB configuration: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
    this.graphName = this.validatedConfig.graphName;

    const cacheSize = options.entityCacheSize ?? DEFAULT_ENTITY_CACHE_SIZE;
    if (!Number.isInteger(cacheSize) || cacheSize < 0) {
      throw new StorageConfigError(
        `Invalid entity cache size: ${cacheSize} (expected a non-negative integer)`,
      );
    }
    this.entityCache = new EntityCache(cacheSize);
    this.warmCache = options.warmCache ?? false;
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  /**
   * Connect to FalkorDB
   * @throws ConnectionError if connection fails
   */
  async connect(): Promise<void> {
    if (this.connectionState === 'connected') {
      return;
    }

    if (this.connectionState === 'connecting') {
      throw new ConnectionError('Connection already in progress');
    }

    this.connectionState = 'connecting';

    try {
      this.client = await FalkorDB.connect({
        socket: {
          host: this.validatedConfig.host,
          port: this.validatedConfig.port,
        },
        password: this.validatedConfig.password,
      });
      this.graph = this.client.selectGraph(this.graphName);
      this.connectionState = 'connected';
    } catch (error) {
      this.connectionState = 'error';
      this.client = null;
      this.graph = null;
      throw new ConnectionError(
        `Failed to connect to FalkorDB at ${this.validatedConfig.host}:${this.validatedConfig.port}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (this.warmCache && this.entityCache.enabled) {
      await this.warmEntityCache();
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.graph = null;
    this.connectionState = 'disconnected';
    this.entityCache.clear();
    if (!client) return;

    try {
      await client.close();
    } catch (error) {
      throw new ConnectionError(
        'Failed to close FalkorDB connection',
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Check if database is healthy and responsive
   */
  async healthCheck(): Promise<boolean> {
    if (this.connectionState !== 'connected') {
      return false;
    }

    try {
      await this.query('RETURN 1');
      return true;
    } catch (error) {
      if (error instanceof QueryError) return false;
      throw error;
    }
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
    await this.commit(tx.drain());
    return result;
  }

  async lookupByCanonicalId(canonicalId: string): Promise<Entity | null> {
    const cached = this.entityCache.get(canonicalId);
    if (cached) return cached;

    const rows = await this.query(
      `MATCH (n:${ENTITY_LABEL})
       WHERE n.canonical_id = $id OR $id IN n.alias_ids
       RETURN ${ENTITY_RETURN} LIMIT 1`,
      { id: canonicalId },
    );
    if (rows.length === 0) return null;

    const entity = parseEntityRow(rows[0]);
    this.entityCache.set(canonicalId, entity);
    return entity;
  }

  async lookupBySimilarity(
    vector: number[],
    threshold: number,
    limit?: number,
  ): Promise<SimilarEntity[]> {
    // Embeddings are stored as JSON strings, so scoring happens here
    const rows = await this.query(
      `MATCH (n:${ENTITY_LABEL}) WHERE n.embedding IS NOT NULL
       RETURN ${ENTITY_RETURN}`,
    );

    const matches: SimilarEntity[] = [];
    for (const row of rows) {
      const entity = parseEntityRow(row);
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
    return this.queryRelationships('r.chunk_id = $chunkId', { chunkId });
  }

  async countOutgoingEdges(entityId: string): Promise<number> {
    const rows = await this.query(
      `${RELATIONSHIP_MATCH} WHERE a.canonical_id = $id RETURN count(r) AS count`,
      { id: entityId },
    );
    return this.parseCount(rows);
  }

  async listOutgoingEdges(entityId: string): Promise<Relationship[]> {
    return this.queryRelationships('a.canonical_id = $id', { id: entityId });
  }

  async findRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
  ): Promise<Relationship | null> {
    const found = await this.queryRelationships(
      'a.canonical_id = $source AND b.canonical_id = $target AND r.relationship_type = $type',
      { source: sourceId, target: targetId, type },
    );
    return found[0] ?? null;
  }

  async getEntities(canonicalIds: string[]): Promise<Entity[]> {
    if (canonicalIds.length === 0) return [];
    const rows = await this.query(
      `MATCH (n:${ENTITY_LABEL}) WHERE n.canonical_id IN $ids
       RETURN ${ENTITY_RETURN}`,
      { ids: [...new Set(canonicalIds)] },
    );
    return rows.map(parseEntityRow);
  }

  async getIncidentRelationships(entityIds: string[]): Promise<Relationship[]> {
    if (entityIds.length === 0) return [];
    return this.queryRelationships(
      'a.canonical_id IN $ids OR b.canonical_id IN $ids',
      { ids: [...new Set(entityIds)] },
    );
  }

  /**
   * Get statistics about stored data
   */
  async getStatistics(): Promise<GraphStatistics> {
    const entities = this.parseCount(
      await this.query(`MATCH (n:${ENTITY_LABEL}) RETURN count(n) AS count`),
    );
    const chunks = this.parseCount(
      await this.query(
        `${RELATIONSHIP_MATCH} RETURN count(DISTINCT r.chunk_id) AS count`,
      ),
    );
    const typeRows = await this.query(
      `${RELATIONSHIP_MATCH} RETURN r.relationship_type AS type, count(r) AS count`,
    );

    const relationshipTypes: Record<string, number> = {};
    let relationships = 0;
    for (const row of typeRows) {
      const parsed = TypeCountRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageParseError(
          `Invalid statistics row: ${parsed.error.message}`,
          'relationship_type',
        );
      }
      relationshipTypes[parsed.data.type] = parsed.data.count;
      relationships += parsed.data.count;
    }

    return { entities, relationships, chunks, relationshipTypes };
  }

  /**
   * Clear all knowledge graph data
   */
  async clear(): Promise<void> {
    this.entityCache.clear();
    await this.query(`MATCH (n:${ENTITY_LABEL}) DETACH DELETE n`);
  }

  // ============ Private Methods ============

  private async commit(changes: StagedChanges): Promise<void> {
    if (
      changes.entities.length === 0 &&
      changes.relationships.length === 0 &&
      changes.deletedRelationshipIds.length === 0
    ) {
      return;
    }

    // Invalidated before the write so a failed commit cannot leave stale
    // entries behind
    this.entityCache.invalidate(changes.entities);
    await this.query(COMMIT_QUERY, {
      entities: changes.entities.map(toEntityParams),
      relationships: changes.relationships.map(toRelationshipParams),
      deleted: changes.deletedRelationshipIds,
    });
  }

  private async warmEntityCache(): Promise<void> {
    const rows = await this.query(
      `MATCH (n:${ENTITY_LABEL}) RETURN ${ENTITY_RETURN} LIMIT $limit`,
      { limit: this.entityCache.maxEntries },
    );
    for (const row of rows) {
      const entity = parseEntityRow(row);
      this.entityCache.set(entity.canonical_id, entity);
    }
  }

  private async queryRelationships(
    where: string,
    params: QueryParams,
  ): Promise<Relationship[]> {
    const rows = await this.query(
      `${RELATIONSHIP_MATCH} WHERE ${where} RETURN ${RELATIONSHIP_RETURN}`,
      params,
    );
    return rows.map(parseRelationshipRow);
  }

  /**
   * Execute a Cypher query and return its rows
   * @throws QueryError if query execution fails
   */
  private async query(cypher: string, params?: QueryParams): Promise<unknown[]> {
    const graph = this.requireConnection();

    try {
      const result = await graph.query(cypher, { params });
      const rows: unknown[] = result.data ?? [];
      return rows;
    } catch (error) {
      throw new QueryError(
        'Query execution failed',
        cypher,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private parseCount(rows: unknown[]): number {
    const parsed = CountRowSchema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new StorageParseError(
        `Invalid count row: ${parsed.error.message}`,
        'count',
      );
    }
    return parsed.data.count;
  }

  /**
   * Get the graph instance, throwing if not connected
   */
  private requireConnection(): Graph {
    if (this.connectionState !== 'connected' || !this.graph) {
      throw new ConnectionError(
        'Not connected to FalkorDB. Call connect() first.',
      );
    }
    return this.graph;
  }
}

function toEntityParams(entity: Entity): QueryParams {
  return {
    canonical_id: entity.canonical_id,
    name: entity.name,
    description: entity.description,
    entity_type: entity.entity_type,
    metadata: JSON.stringify(entity.metadata),
    source_chunk_ids: entity.source_chunk_ids,
    alias_ids: entity.alias_ids,
    embedding: entity.embedding ? JSON.stringify(entity.embedding) : null,
  };
}

function toRelationshipParams(rel: Relationship): QueryParams {
  return {
    id: rel.id,
    source: rel.source_entity_id,
    target: rel.target_entity_id,
    description: rel.description,
    relationship_type: rel.relationship_type,
    confidence: rel.confidence,
    weight: rel.weight,
    chunk_id: rel.chunk_id,
    metadata: JSON.stringify(rel.metadata),
  };
}
