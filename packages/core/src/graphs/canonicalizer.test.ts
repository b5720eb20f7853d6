import { KnowledgeGraphConfigSchema } from '@graphweave/shared';
import { describe, expect, it } from 'vitest';
import { makeEntity, TableEmbeddings } from '../test-helpers.js';
import {
  Canonicalizer,
  computeCanonicalId,
  embeddingText,
  normalizeEntityName,
} from './canonicalizer.js';

const enhanced = KnowledgeGraphConfigSchema.parse({ enableEnhancedKg: true });
const legacy = KnowledgeGraphConfigSchema.parse({ enableEnhancedKg: false });

describe('normalizeEntityName', () => {
  it.each([
    ['TiDB Database', 'tidb database'],
    ['  MySQL   Server  ', 'mysql server'],
    ['Data-Processing Engine', 'data-processing engine'],
    ["User's Guide (v1.0)", 'users guide v10'],
    ['-leading and trailing-', 'leading and trailing'],
    ['Ｆｕｌｌｗｉｄｔｈ', 'fullwidth'],
    ['Café Crème', 'café crème'],
  ])('should normalize %j to %j', (input, expected) => {
    expect(normalizeEntityName(input)).toBe(expected);
  });

  it('should keep preserved names verbatim apart from whitespace', () => {
    const preserve = new Set(['API', 'ICU']);
    expect(normalizeEntityName('API', preserve)).toBe('API');
    expect(normalizeEntityName('  ICU ', preserve)).toBe('ICU');
    expect(normalizeEntityName('Api', preserve)).toBe('api');
  });
});

describe('computeCanonicalId', () => {
  it('should return 16 lowercase hex characters', () => {
    expect(computeCanonicalId('tidb database', 'a database')).toMatch(
      /^[0-9a-f]{16}$/,
    );
  });

  it('should only use the first 100 description characters', () => {
    const base = 'x'.repeat(100);
    expect(computeCanonicalId('tidb', `${base}tail one`)).toBe(
      computeCanonicalId('tidb', `${base}tail two`),
    );
    expect(computeCanonicalId('tidb', 'short')).not.toBe(
      computeCanonicalId('tidb', 'other'),
    );
  });

  it('should treat a missing description as empty', () => {
    expect(computeCanonicalId('tidb')).toBe(computeCanonicalId('tidb', ''));
  });
});

describe('embeddingText', () => {
  it('should join name and description', () => {
    expect(embeddingText('TiDB', 'a database')).toBe('TiDB: a database');
    expect(embeddingText('TiDB', '')).toBe('TiDB');
  });
});

describe('Canonicalizer', () => {
  it('should give equivalent names the same canonical id', () => {
    const canonicalizer = new Canonicalizer(enhanced);
    expect(canonicalizer.canonicalId('TiDB Database', 'db')).toBe(
      canonicalizer.canonicalId('tidb   database', 'db'),
    );
  });

  it('should preserve configured acronyms', () => {
    const canonicalizer = new Canonicalizer(enhanced);
    expect(canonicalizer.normalize('API')).toBe('API');
    expect(canonicalizer.canonicalId('API')).not.toBe(
      canonicalizer.canonicalId('api'),
    );
  });

  it('should return names unchanged when canonicalization is off', () => {
    const canonicalizer = new Canonicalizer(legacy);
    expect(canonicalizer.normalize('TiDB Database')).toBe('TiDB Database');
    expect(canonicalizer.canonicalId('TiDB Database')).not.toBe(
      canonicalizer.canonicalId('tidb database'),
    );

    const toggledOff = new Canonicalizer(
      KnowledgeGraphConfigSchema.parse({
        enableEnhancedKg: true,
        canonicalizationEnabled: false,
      }),
    );
    expect(toggledOff.normalize('TiDB')).toBe('TiDB');
  });

  describe('shouldMerge', () => {
    it('should merge on exact canonical id or alias', () => {
      const canonicalizer = new Canonicalizer(enhanced);
      const existing = makeEntity({ canonical_id: 'e1', alias_ids: ['a1'] });
      expect(canonicalizer.shouldMerge(existing, { canonical_id: 'e1' })).toBe(
        true,
      );
      expect(canonicalizer.shouldMerge(existing, { canonical_id: 'a1' })).toBe(
        true,
      );
      expect(canonicalizer.shouldMerge(existing, { canonical_id: 'e2' })).toBe(
        false,
      );
    });

    it('should merge by similarity only with an embedding provider', () => {
      const existing = makeEntity({ canonical_id: 'e1', embedding: [1, 0] });
      const candidate = { canonical_id: 'e2', embedding: [0.9, 0.1] };

      const withoutEmbeddings = new Canonicalizer(enhanced);
      expect(withoutEmbeddings.fuzzyMatching).toBe(false);
      expect(withoutEmbeddings.shouldMerge(existing, candidate)).toBe(false);

      const fuzzy = new Canonicalizer(enhanced, new TableEmbeddings({}));
      expect(fuzzy.fuzzyMatching).toBe(true);
      expect(fuzzy.shouldMerge(existing, candidate)).toBe(true);
      expect(
        fuzzy.shouldMerge(existing, { canonical_id: 'e3', embedding: [0, 1] }),
      ).toBe(false);
    });

    it('should use the legacy similarity floor when disabled', () => {
      expect(new Canonicalizer(legacy).similarityFloor).toBeCloseTo(0.9);
      expect(new Canonicalizer(enhanced).similarityFloor).toBe(0.85);
    });
  });
});
