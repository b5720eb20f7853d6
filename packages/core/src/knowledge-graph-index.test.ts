import {
  KnowledgeGraphConfigSchema,
  RetrievalConfigSchema,
} from '@graphweave/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import { SchedulerValidationError } from './executor/errors.js';
import { KnowledgeGraphIndex, textChunkId } from './knowledge-graph-index.js';
import { InMemoryGraphStore } from './storage/memory.js';
import {
  createMockLogger,
  ScriptedExtractor,
  TableEmbeddings,
} from './test-helpers.js';

const RAFT_TEXT = 'Raft is a consensus algorithm.';
const PAXOS_TEXT = 'Paxos is a consensus algorithm.';

describe('KnowledgeGraphIndex', () => {
  let store: InMemoryGraphStore;
  let extractor: ScriptedExtractor;
  let index: KnowledgeGraphIndex;

  beforeEach(() => {
    store = new InMemoryGraphStore();
    extractor = new ScriptedExtractor({
      [RAFT_TEXT]: {
        entities: [{ name: 'Raft' }, { name: 'Consensus' }],
        relationships: [
          {
            source_entity_name: 'Raft',
            target_entity_name: 'Consensus',
            relationship_type: 'hyponym',
            confidence: 1,
          },
        ],
      },
      [PAXOS_TEXT]: {
        entities: [{ name: 'Paxos' }, { name: 'Consensus' }],
        relationships: [
          {
            source_entity_name: 'Paxos',
            target_entity_name: 'Consensus',
            confidence: 0.6,
          },
        ],
      },
    });
    index = new KnowledgeGraphIndex({
      store,
      extractor,
      embeddings: new TableEmbeddings({
        Raft: [1, 0, 0],
        Consensus: [0, 1, 0],
        Paxos: [0, 0, 1],
        'raft query': [1, 0, 0],
      }),
      knowledgeGraph: KnowledgeGraphConfigSchema.parse({
        enableEnhancedKg: true,
        maxWorkers: 2,
      }),
      retrieval: RetrievalConfigSchema.parse({}),
      logger: createMockLogger(),
    });
  });

  describe('ingestion', () => {
    it('should key free text by its digest and ingest it once', async () => {
      const first = await index.addText(RAFT_TEXT);
      const second = await index.addText(RAFT_TEXT);

      expect(first).toEqual({
        chunk_id: textChunkId(RAFT_TEXT),
        status: 'processed',
        summary: { entities: 2, relationships: 1, mirrored: 0, evicted: 0 },
      });
      expect(second.status).toBe('skipped');
      expect(textChunkId(RAFT_TEXT)).toMatch(/^text:[0-9a-f]{16}$/);
      expect(extractor.calls).toEqual([RAFT_TEXT]);
    });

    it('should ingest a batch and merge shared entities', async () => {
      const results = await index.addChunks([
        { id: 'c1', text: RAFT_TEXT },
        { id: 'c2', text: PAXOS_TEXT },
      ]);

      expect(results.map((r) => [r.chunk_id, r.status])).toEqual([
        ['c1', 'processed'],
        ['c2', 'processed'],
      ]);
      expect(await store.getStatistics()).toMatchObject({
        entities: 3,
        relationships: 2,
        chunks: 2,
      });
    });

    it('should propagate batch validation errors', async () => {
      await expect(index.addChunks([{ id: '', text: 'x' }])).rejects.toThrow(
        SchedulerValidationError,
      );
    });
  });

  describe('retrieve', () => {
    it('should retrieve the neighbourhood of the best seed', async () => {
      await index.addChunk({ id: 'c1', text: RAFT_TEXT });

      const result = await index.retrieve('raft query', 1);

      expect(
        result.entities.map((e) => [e.entity.name, e.score, e.depth]),
      ).toEqual([
        ['Raft', 1, 0],
        ['Consensus', expect.closeTo(0.8), 1],
      ]);
      expect(result.relationships).toHaveLength(1);
    });
  });

  describe('statistics', () => {
    it('should report typed coverage and edge to node ratio', async () => {
      await index.addChunks([
        { id: 'c1', text: RAFT_TEXT },
        { id: 'c2', text: PAXOS_TEXT },
      ]);

      expect(await index.getStatistics()).toEqual({
        entities: 3,
        relationships: 2,
        chunks: 2,
        relationshipTypes: { hyponym: 1, generic: 1 },
        typedCoverage: 0.5,
        edgeToNodeRatio: 2 / 3,
      });
    });

    it('should report zeros for an empty graph after reset', async () => {
      await index.addChunk({ id: 'c1', text: RAFT_TEXT });
      await index.reset();

      expect(await index.getStatistics()).toEqual({
        entities: 0,
        relationships: 0,
        chunks: 0,
        relationshipTypes: {},
        typedCoverage: 0,
        edgeToNodeRatio: 0,
      });
    });
  });
});
