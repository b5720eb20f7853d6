/**
 * Entity canonicalization: name normalization, deterministic canonical ids
 * and the merge decision for candidates extracted from different chunks.
 */
import { createHash } from 'node:crypto';
import {
  type EmbeddingProvider,
  type Entity,
  getSimilarityFloor,
  isFeatureEnabled,
  type KnowledgeGraphConfig,
} from '@graphweave/shared';
import { cosineSimilarity } from './similarity.js';

/** Characters of the description that feed the canonical id */
export const CANONICAL_DESCRIPTION_PREFIX = 100;

const CANONICAL_ID_LENGTH = 16;

// Anything that is not a letter, digit, combining mark, underscore,
// whitespace or hyphen
const PUNCTUATION = /[^\p{L}\p{N}\p{M}_\s-]/gu;

function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Normalize an entity name.
 *
 * NFKC fold, lowercase, drop punctuation (hyphens survive inside words) and
 * collapse whitespace. Names in `preserveCase` only get NFKC and whitespace
 * handling.
 */
export function normalizeEntityName(
  name: string,
  preserveCase: ReadonlySet<string> = new Set(),
): string {
  const trimmed = name.trim();
  if (preserveCase.has(trimmed)) {
    return collapseWhitespace(trimmed.normalize('NFKC'));
  }

  const folded = trimmed.normalize('NFKC').toLowerCase().replace(PUNCTUATION, '');
  return collapseWhitespace(folded)
    .split(' ')
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter(Boolean)
    .join(' ');
}

/**
 * First 16 hex characters of SHA-256 over `normalized::description[:100]`
 */
export function computeCanonicalId(
  normalizedName: string,
  description = '',
): string {
  const content = `${normalizedName}::${description.slice(0, CANONICAL_DESCRIPTION_PREFIX)}`;
  return createHash('sha256')
    .update(content, 'utf8')
    .digest('hex')
    .slice(0, CANONICAL_ID_LENGTH);
}

/**
 * Text embedded for fuzzy matching and retrieval seeding
 */
export function embeddingText(name: string, description: string): string {
  return description ? `${name}: ${description}` : name;
}

export interface MergeCandidate {
  canonical_id: string;
  embedding?: number[];
}

export class Canonicalizer {
  private readonly preserveCase: ReadonlySet<string>;
  private readonly enabled: boolean;
  readonly similarityFloor: number;

  constructor(
    config: KnowledgeGraphConfig,
    private readonly embeddings?: EmbeddingProvider,
  ) {
    this.enabled = isFeatureEnabled(config, 'canonicalization');
    this.preserveCase = new Set(config.preserveCaseEntities);
    this.similarityFloor = getSimilarityFloor(config);
  }

  /**
   * Normalized form of a name; the name itself when canonicalization is off
   */
  normalize(name: string): string {
    return this.enabled ? normalizeEntityName(name, this.preserveCase) : name;
  }

  canonicalId(name: string, description = ''): string {
    return computeCanonicalId(this.normalize(name), description);
  }

  /**
   * Whether merge decisions may fall back to embedding similarity
   */
  get fuzzyMatching(): boolean {
    return this.enabled && this.embeddings !== undefined;
  }

  /**
   * Exact canonical id (or alias) match merges without embedding work;
   * otherwise, with fuzzy matching on, cosine similarity of the embeddings
   * must reach the similarity floor.
   */
  shouldMerge(existing: Entity, candidate: MergeCandidate): boolean {
    if (
      existing.canonical_id === candidate.canonical_id ||
      existing.alias_ids.includes(candidate.canonical_id)
    ) {
      return true;
    }
    if (!this.fuzzyMatching || !existing.embedding || !candidate.embedding) {
      return false;
    }
    return (
      cosineSimilarity(existing.embedding, candidate.embedding) >=
      this.similarityFloor
    );
  }
}
