// Zod-validated parsing of graph rows read back from FalkorDB
import {
  type Entity,
  MetadataSchema,
  type Metadata,
  type Relationship,
  RelationshipTypeSchema,
} from '@graphweave/shared';
import { z } from 'zod';
import { StorageParseError } from './errors.js';

const StringListSchema = z.array(z.string()).nullish().transform((v) => v ?? []);

export const EntityRowSchema = z.object({
  canonical_id: z.string().min(1),
  name: z.string(),
  description: z.string().nullish().transform((v) => v ?? ''),
  entity_type: z.string().nullish().transform((v) => v || 'concept'),
  metadata: z.string().nullish(),
  source_chunk_ids: StringListSchema,
  alias_ids: StringListSchema,
  embedding: z.string().nullish(),
});

export const RelationshipRowSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  target: z.string().min(1),
  description: z.string().nullish().transform((v) => v ?? ''),
  relationship_type: RelationshipTypeSchema,
  confidence: z.number(),
  weight: z.number(),
  chunk_id: z.string(),
  metadata: z.string().nullish(),
});

const EmbeddingSchema = z.array(z.number());

/**
 * Parse a JSON-encoded property, reporting the field on failure
 */
function parseJsonProperty<T>(
  raw: string,
  schema: z.ZodType<T>,
  field: string,
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageParseError(
      `Stored ${field} is not valid JSON`,
      field,
      error instanceof Error ? error : undefined,
    );
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new StorageParseError(
      `Stored ${field} has an unexpected shape: ${result.error.message}`,
      field,
    );
  }
  return result.data;
}

function parseMetadata(raw: string | null | undefined): Metadata {
  return raw ? parseJsonProperty(raw, MetadataSchema, 'metadata') : {};
}

/**
 * Convert a returned entity row into an Entity
 * @throws StorageParseError when the row does not match the stored shape
 */
export function parseEntityRow(row: unknown): Entity {
  const result = EntityRowSchema.safeParse(row);
  if (!result.success) {
    throw new StorageParseError(
      `Invalid entity row: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  const data = result.data;
  const entity: Entity = {
    canonical_id: data.canonical_id,
    name: data.name,
    description: data.description,
    entity_type: data.entity_type,
    metadata: parseMetadata(data.metadata),
    source_chunk_ids: data.source_chunk_ids,
    alias_ids: data.alias_ids,
  };
  if (data.embedding) {
    entity.embedding = parseJsonProperty(
      data.embedding,
      EmbeddingSchema,
      'embedding',
    );
  }
  return entity;
}

/**
 * Convert a returned relationship row into a Relationship
 * @throws StorageParseError when the row does not match the stored shape
 */
export function parseRelationshipRow(row: unknown): Relationship {
  const result = RelationshipRowSchema.safeParse(row);
  if (!result.success) {
    throw new StorageParseError(
      `Invalid relationship row: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  const data = result.data;
  return {
    id: data.id,
    source_entity_id: data.source,
    target_entity_id: data.target,
    description: data.description,
    relationship_type: data.relationship_type,
    confidence: data.confidence,
    weight: data.weight,
    chunk_id: data.chunk_id,
    metadata: parseMetadata(data.metadata),
  };
}
