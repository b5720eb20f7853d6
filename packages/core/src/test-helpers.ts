// Shared fixtures for core tests
import type {
  EmbeddingProvider,
  Entity,
  ExtractOptions,
  GraphExtractor,
  GraphFragmentInput,
  Logger,
  Relationship,
} from '@graphweave/shared';
import { vi } from 'vitest';

export function makeEntity(overrides: Partial<Entity> = {}): Entity {
  return {
    canonical_id: 'entity-a',
    name: 'Entity A',
    description: '',
    entity_type: 'concept',
    metadata: {},
    source_chunk_ids: ['chunk-0'],
    alias_ids: [],
    ...overrides,
  };
}

export function makeRelationship(
  overrides: Partial<Relationship> = {},
): Relationship {
  return {
    id: 'rel-1',
    source_entity_id: 'entity-a',
    target_entity_id: 'entity-b',
    description: '',
    relationship_type: 'generic',
    confidence: 0.8,
    weight: 4,
    chunk_id: 'chunk-0',
    metadata: {},
    ...overrides,
  };
}

/**
 * Embeddings from a fixed table; unknown text embeds to the zero vector,
 * which has similarity 0 with everything.
 */
export class TableEmbeddings implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly table: Record<string, number[]>,
    private readonly dimensions = 3,
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.table[text] ?? new Array<number>(this.dimensions).fill(0);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

type ScriptStep =
  | GraphFragmentInput
  | Error
  | ((options: ExtractOptions | undefined) => Promise<GraphFragmentInput>);

/**
 * Extractor answering from a text-keyed script
 */
export class ScriptedExtractor implements GraphExtractor {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, ScriptStep>) {}

  async extract(
    text: string,
    options?: ExtractOptions,
  ): Promise<GraphFragmentInput> {
    this.calls.push(text);
    const step = this.script[text];
    if (step === undefined) {
      return { entities: [], relationships: [] };
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(options);
    }
    return step;
  }
}

/**
 * Resolve after ms, or reject when the signal aborts first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true },
    );
  });
}

export function createMockLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
