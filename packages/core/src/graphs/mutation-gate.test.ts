import {
  type Entity,
  type GraphFragmentInput,
  type GraphStatistics,
  KnowledgeGraphConfigSchema,
  type KnowledgeGraphConfigInput,
  type Relationship,
} from '@graphweave/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import { QueryError } from '../storage/errors.js';
import type { GraphTransaction } from '../storage/interface.js';
import { InMemoryGraphStore } from '../storage/memory.js';
import { StagedTransaction } from '../storage/staged-transaction.js';
import { createMockLogger, TableEmbeddings } from '../test-helpers.js';
import { computeCanonicalId } from './canonicalizer.js';
import { FragmentValidationError, MutationError } from './errors.js';
import { GraphMutationGate, relationshipId } from './mutation-gate.js';

function createGate(
  store: InMemoryGraphStore,
  overrides: Partial<KnowledgeGraphConfigInput> = {},
  embeddings?: TableEmbeddings,
): GraphMutationGate {
  return new GraphMutationGate({
    config: KnowledgeGraphConfigSchema.parse({
      enableEnhancedKg: true,
      ...overrides,
    }),
    store,
    embeddings,
    logger: createMockLogger(),
  });
}

function pair(
  type: string,
  confidence = 0.9,
  names: [string, string] = ['Alpha', 'Beta'],
): GraphFragmentInput {
  return {
    entities: [{ name: names[0] }, { name: names[1] }],
    relationships: [
      {
        source_entity_name: names[0],
        target_entity_name: names[1],
        relationship_type: type,
        confidence,
      },
    ],
  };
}

const alphaId = computeCanonicalId('alpha');
const betaId = computeCanonicalId('beta');

async function snapshot(target: InMemoryGraphStore): Promise<{
  entities: Entity[];
  relationships: Relationship[];
  statistics: GraphStatistics;
}> {
  return {
    entities: await target.getEntities([alphaId, betaId]),
    relationships: (
      await target.getIncidentRelationships([alphaId, betaId])
    ).sort((a, b) => a.id.localeCompare(b.id)),
    statistics: await target.getStatistics(),
  };
}

describe('GraphMutationGate', () => {
  let store: InMemoryGraphStore;

  beforeEach(() => {
    store = new InMemoryGraphStore();
  });

  describe('idempotency', () => {
    it('should apply a chunk once and report later attempts', async () => {
      const gate = createGate(store);

      const first = await gate.apply('c1', pair('synonym'));
      const before = await snapshot(store);
      const second = await gate.apply('c1', {
        entities: [{ name: 'Alpha', description: 'a longer description' }],
        relationships: [
          {
            source_entity_name: 'Alpha',
            target_entity_name: 'Alpha',
            relationship_type: 'causal',
          },
        ],
      });

      expect(first.status).toBe('applied');
      expect(second).toEqual({
        chunkId: 'c1',
        status: 'already_processed',
        entities: [],
        relationships: [],
        mirrored: 0,
        evicted: [],
        dropped: { malformed: 0, unresolved: 0, lowConfidence: 0 },
      });
      expect(await snapshot(store)).toEqual(before);
      expect(before.statistics).toMatchObject({
        entities: 2,
        relationships: 2,
      });
    });

    it('should report a processed chunk before validating its fragment', async () => {
      const gate = createGate(store);
      await gate.apply('c1', pair('causal'));

      const replay = await gate.apply('c1', 'not a fragment');

      expect(replay.status).toBe('already_processed');
      await expect(gate.apply('c2', 'not a fragment')).rejects.toThrow(
        FragmentValidationError,
      );
    });

    it('should serialize concurrent applies of the same chunk', async () => {
      const gate = createGate(store);

      const results = await Promise.all([
        gate.apply('c1', pair('causal')),
        gate.apply('c1', pair('causal')),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual([
        'already_processed',
        'applied',
      ]);
      expect((await store.getStatistics()).relationships).toBe(1);
    });
  });

  describe('entities', () => {
    it('should merge equivalent names from different chunks', async () => {
      const gate = createGate(store);

      await gate.apply('c1', { entities: [{ name: 'TiDB Database' }] });
      await gate.apply('c2', { entities: [{ name: 'tidb   database' }] });

      const entity = await store.lookupByCanonicalId(
        computeCanonicalId('tidb database'),
      );
      expect(entity?.name).toBe('TiDB Database');
      expect(entity?.source_chunk_ids).toEqual(['c1', 'c2']);
      expect((await store.getStatistics()).entities).toBe(1);
    });

    it('should apply the merge policy for descriptions, types and metadata', async () => {
      const gate = createGate(store);
      const id = computeCanonicalId('tidb');

      await gate.apply('c1', {
        entities: [
          {
            name: 'TiDB',
            entity_type: 'concept',
            metadata: { vendor: 'a', region: 'eu' },
          },
        ],
      });
      await gate.apply('c2', {
        entities: [
          {
            name: 'tidb',
            entity_type: 'product',
            metadata: { vendor: 'b' },
          },
        ],
      });

      expect(await store.lookupByCanonicalId(id)).toMatchObject({
        name: 'TiDB',
        entity_type: 'product',
        metadata: { vendor: 'b', region: 'eu' },
      });
    });

    it('should keep acronyms distinct from lowercase names', async () => {
      const gate = createGate(store);
      await gate.apply('c1', { entities: [{ name: 'API' }, { name: 'api' }] });
      expect((await store.getStatistics()).entities).toBe(2);
    });

    it('should merge by similarity and record the alias', async () => {
      const embeddings = new TableEmbeddings({
        'Postgres: relational database': [1, 0, 0],
        'PostgreSQL: relational database': [0.99, 0.1, 0],
      });
      const gate = createGate(store, {}, embeddings);
      const aliasId = computeCanonicalId('postgresql', 'relational database');

      await gate.apply('c1', {
        entities: [{ name: 'Postgres', description: 'relational database' }],
      });
      const result = await gate.apply('c2', {
        entities: [{ name: 'PostgreSQL', description: 'relational database' }],
      });

      expect(result.entities).toHaveLength(1);
      expect(result.entities[0]?.canonical_id).toBe(
        computeCanonicalId('postgres', 'relational database'),
      );
      expect(result.entities[0]?.alias_ids).toEqual([aliasId]);
      expect((await store.lookupByCanonicalId(aliasId))?.name).toBe(
        'Postgres',
      );
      expect((await store.getStatistics()).entities).toBe(1);
    });

    it('should not record aliases when alias tracking is off', async () => {
      const embeddings = new TableEmbeddings({
        'Postgres: relational database': [1, 0, 0],
        'PostgreSQL: relational database': [0.99, 0.1, 0],
      });
      const gate = createGate(store, { aliasTrackingEnabled: false }, embeddings);

      await gate.apply('c1', {
        entities: [{ name: 'Postgres', description: 'relational database' }],
      });
      const result = await gate.apply('c2', {
        entities: [{ name: 'PostgreSQL', description: 'relational database' }],
      });

      expect(result.entities[0]?.alias_ids).toEqual([]);
      expect((await store.getStatistics()).entities).toBe(1);
    });

    it('should store embeddings for new entities', async () => {
      const embeddings = new TableEmbeddings({ Alpha: [0, 1, 0] });
      const gate = createGate(store, {}, embeddings);

      await gate.apply('c1', { entities: [{ name: 'Alpha' }] });

      expect((await store.lookupByCanonicalId(alphaId))?.embedding).toEqual([
        0, 1, 0,
      ]);
    });

    it('should skip embedding work for exact matches', async () => {
      const embeddings = new TableEmbeddings({});
      const gate = createGate(store, {}, embeddings);

      await gate.apply('c1', { entities: [{ name: 'Alpha' }] });
      await gate.apply('c2', { entities: [{ name: 'alpha' }] });

      expect(embeddings.calls).toEqual(['Alpha']);
    });
  });

  describe('relationships', () => {
    it('should drop relationships below the confidence minimum', async () => {
      const gate = createGate(store);

      const low = await gate.apply('c1', pair('causal', 0.2));
      const boundary = await gate.apply('c2', pair('causal', 0.3));

      expect(low.relationships).toHaveLength(0);
      expect(low.dropped.lowConfidence).toBe(1);
      expect(boundary.relationships).toHaveLength(1);
      expect(boundary.relationships[0]?.confidence).toBe(0.3);
    });

    it('should drop relationships with unresolved endpoints', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', {
        entities: [{ name: 'Alpha' }],
        relationships: [
          { source_entity_name: 'Alpha', target_entity_name: 'Gamma' },
        ],
      });

      expect(result.relationships).toHaveLength(0);
      expect(result.dropped.unresolved).toBe(1);
    });

    it('should resolve endpoints through normalized names', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', {
        entities: [{ name: 'TiDB Database' }, { name: 'SQL Layer' }],
        relationships: [
          {
            source_entity_name: 'tidb database',
            target_entity_name: 'SQL  layer',
            relationship_type: 'meronym',
          },
        ],
      });

      expect(result.relationships).toHaveLength(1);
      expect(result.relationships[0]?.source_entity_id).toBe(
        computeCanonicalId('tidb database'),
      );
    });

    it('should weight by type and confidence', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', pair('hypernym', 0.9));

      expect(result.relationships[0]).toMatchObject({
        id: relationshipId('c1', alphaId, betaId, 'hypernym', ''),
        relationship_type: 'hypernym',
        confidence: 0.9,
        chunk_id: 'c1',
      });
      expect(result.relationships[0]?.weight).toBeCloseTo(9.0);
    });

    it('should map unknown relationship types to generic', async () => {
      const gate = createGate(store);
      const result = await gate.apply('c1', pair('collaborates_with', 0.8));
      expect(result.relationships[0]?.relationship_type).toBe('generic');
      expect(result.relationships[0]?.weight).toBeCloseTo(4.0);
    });

    it('should count malformed items and keep the rest', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', {
        entities: [{ name: 'Alpha' }, { name: '' }, { name: 'Beta' }, 42],
        relationships: [
          { source_entity_name: 'Alpha', target_entity_name: 'Beta' },
          { source_entity_name: 'Alpha', confidence: 'high' },
        ],
      });

      expect(result.dropped.malformed).toBe(3);
      expect(result.entities).toHaveLength(2);
      expect(result.relationships).toHaveLength(1);
    });

    it('should drop names that normalize to nothing as malformed', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', {
        entities: [{ name: 'Alpha' }, { name: '!!!' }, { name: '-- ...' }],
        relationships: [
          { source_entity_name: 'Alpha', target_entity_name: '!!!' },
        ],
      });

      expect(result.dropped).toEqual({
        malformed: 2,
        unresolved: 1,
        lowConfidence: 0,
      });
      expect(result.entities.map((e) => e.canonical_id)).toEqual([alphaId]);
      expect((await store.getStatistics()).entities).toBe(1);
    });

    it('should reject fragments that are not objects of arrays', async () => {
      const gate = createGate(store);

      await expect(gate.apply('c1', 'not a fragment')).rejects.toThrow(
        FragmentValidationError,
      );
      await expect(
        gate.apply('c1', { entities: 'Alpha' }),
      ).rejects.toBeInstanceOf(FragmentValidationError);
    });
  });

  describe('symmetric mirroring', () => {
    it('should mirror synonyms with the same weight', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', pair('synonym', 0.95));

      expect(result.mirrored).toBe(1);
      const forward = await store.findRelationship(alphaId, betaId, 'synonym');
      const backward = await store.findRelationship(betaId, alphaId, 'synonym');
      expect(forward).not.toBeNull();
      expect(backward?.weight).toBe(forward?.weight);
      expect(backward?.metadata.mirrored_from).toBe(forward?.id);
    });

    it('should not mirror causal relationships', async () => {
      const gate = createGate(store);

      const result = await gate.apply('c1', pair('causal', 0.9));

      expect(result.mirrored).toBe(0);
      expect(await store.findRelationship(betaId, alphaId, 'causal')).toBeNull();
    });

    it('should not mirror when the inverse already exists', async () => {
      const gate = createGate(store);

      await gate.apply('c1', pair('synonym', 0.9, ['Beta', 'Alpha']));
      const result = await gate.apply('c2', pair('synonym', 0.9));

      expect(result.mirrored).toBe(0);
    });

    it('should not mirror in legacy mode', async () => {
      const gate = createGate(store, { enableEnhancedKg: false });

      const result = await gate.apply('c1', pair('synonym', 0.9));

      expect(result.mirrored).toBe(0);
      expect(result.relationships[0]?.relationship_type).toBe('generic');
    });
  });

  describe('edge cap', () => {
    it('should keep the highest-weight edges of an entity', async () => {
      const gate = createGate(store, { minRelationshipConfidence: 0 });
      const targets = Array.from({ length: 60 }, (_, i) => `Target ${i}`);

      const result = await gate.apply('c1', {
        entities: [{ name: 'Hub' }, ...targets.map((name) => ({ name }))],
        relationships: targets.map((name, i) => ({
          source_entity_name: 'Hub',
          target_entity_name: name,
          relationship_type: 'generic',
          confidence: 0.3 + i * 0.01,
        })),
      });

      const hubId = computeCanonicalId('hub');
      const edges = await store.listOutgoingEdges(hubId);
      expect(edges).toHaveLength(50);
      expect(result.evicted).toHaveLength(10);
      expect(result.relationships).toHaveLength(50);
      const minConfidence = Math.min(...edges.map((e) => e.confidence));
      expect(minConfidence).toBeCloseTo(0.4);
    });

    it('should evict older lower-weight edges for new heavier ones', async () => {
      const gate = createGate(store, { maxEdgesPerEntity: 2 });

      await gate.apply('c1', {
        entities: [{ name: 'Hub' }, { name: 'A' }, { name: 'B' }],
        relationships: [
          { source_entity_name: 'Hub', target_entity_name: 'A', confidence: 0.5 },
          { source_entity_name: 'Hub', target_entity_name: 'B', confidence: 0.6 },
        ],
      });
      const result = await gate.apply('c2', {
        entities: [{ name: 'Hub' }, { name: 'C' }],
        relationships: [
          {
            source_entity_name: 'Hub',
            target_entity_name: 'C',
            relationship_type: 'hypernym',
            confidence: 0.9,
          },
        ],
      });

      const hubId = computeCanonicalId('hub');
      const targets = (await store.listOutgoingEdges(hubId))
        .map((e) => e.target_entity_id)
        .sort();
      expect(targets).toEqual(
        [computeCanonicalId('b'), computeCanonicalId('c')].sort(),
      );
      expect(result.evicted).toHaveLength(1);
    });

    it('should apply the cap to mirrored edges', async () => {
      const gate = createGate(store, { maxEdgesPerEntity: 1 });

      await gate.apply('c1', {
        entities: [{ name: 'Beta' }, { name: 'Gamma' }],
        relationships: [
          {
            source_entity_name: 'Beta',
            target_entity_name: 'Gamma',
            relationship_type: 'hypernym',
            confidence: 1,
          },
        ],
      });
      await gate.apply('c2', pair('synonym', 0.5));

      expect(await store.countOutgoingEdges(betaId)).toBe(1);
    });
  });

  describe('failures', () => {
    it('should propagate storage failures without partial writes', async () => {
      class FailingStore extends InMemoryGraphStore {
        override async transaction<T>(
          fn: (tx: GraphTransaction) => Promise<T>,
        ): Promise<T> {
          await fn(new StagedTransaction(this));
          throw new QueryError('write failed');
        }
      }
      const failing = new FailingStore();
      const gate = createGate(failing);

      await expect(gate.apply('c1', pair('causal'))).rejects.toThrow(
        QueryError,
      );
      expect((await failing.getStatistics()).entities).toBe(0);
    });

    it('should wrap embedding failures in MutationError', async () => {
      const embeddings = new TableEmbeddings({});
      embeddings.embed = async () => {
        throw new Error('rate limited');
      };
      const gate = createGate(store, {}, embeddings);

      await expect(
        gate.apply('c1', { entities: [{ name: 'Alpha' }] }),
      ).rejects.toThrow(MutationError);
      expect((await store.getStatistics()).entities).toBe(0);
    });
  });
});
