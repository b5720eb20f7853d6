// Relationship typing and edge weights
import {
  isFeatureEnabled,
  type KnowledgeGraphConfig,
  type RelationshipType,
  RelationshipTypeSchema,
} from '@graphweave/shared';

/** Multiplier turning base weight x confidence into the stored edge weight */
export const WEIGHT_SCALE = 10;

export const RELATIONSHIP_BASE_WEIGHTS: Readonly<
  Record<RelationshipType, number>
> = {
  hypernym: 1.0,
  hyponym: 1.0,
  synonym: 0.95,
  meronym: 0.9,
  holonym: 0.9,
  antonym: 0.9,
  dependency: 0.85,
  causal: 0.8,
  temporal: 0.7,
  reference: 0.6,
  generic: 0.5,
};

const SYMMETRIC_TYPES: ReadonlySet<RelationshipType> = new Set([
  'synonym',
  'antonym',
]);

/**
 * Map a free-form type to a known relationship type, `generic` otherwise
 */
export function parseRelationshipType(raw: string): RelationshipType {
  const result = RelationshipTypeSchema.safeParse(raw.trim().toLowerCase());
  return result.success ? result.data : 'generic';
}

/**
 * clamp(confidence, 0, 1) x base(type) x 10
 */
export function relationshipWeight(
  type: RelationshipType,
  confidence: number,
): number {
  const clamped = Math.min(1, Math.max(0, confidence));
  return clamped * RELATIONSHIP_BASE_WEIGHTS[type] * WEIGHT_SCALE;
}

export function isSymmetricRelationship(type: RelationshipType): boolean {
  return SYMMETRIC_TYPES.has(type);
}

/**
 * Config-bound typing decisions used by the mutation gate
 */
export class RelationshipTyper {
  private readonly typed: boolean;
  private readonly mirror: boolean;

  constructor(config: KnowledgeGraphConfig) {
    this.typed = isFeatureEnabled(config, 'typed_relationships');
    this.mirror = isFeatureEnabled(config, 'symmetric_relationships');
  }

  /**
   * Every relationship is generic while typed relationships are off
   */
  resolveType(raw: string): RelationshipType {
    return this.typed ? parseRelationshipType(raw) : 'generic';
  }

  weigh(type: RelationshipType, confidence: number): number {
    return relationshipWeight(type, confidence);
  }

  shouldMirror(type: RelationshipType): boolean {
    return this.mirror && isSymmetricRelationship(type);
  }
}
