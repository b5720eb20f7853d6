// Zod schemas for graph data, configuration and MCP tool validation
import { z } from 'zod';
import preservedCaseEntities from './data/preserved-case-entities.json' with {
  type: 'json',
};

// ============================================================================
// Graph Data Schemas
// ============================================================================

export const RelationshipTypeSchema = z.enum([
  'hypernym',
  'hyponym',
  'meronym',
  'holonym',
  'synonym',
  'antonym',
  'causal',
  'temporal',
  'dependency',
  'reference',
  'generic',
]);

export const MetadataSchema = z.record(z.string(), z.unknown());

// Externally owned unit of ingestion
export const ChunkSchema = z.object({
  id: z.string().min(1, 'chunk id is required'),
  text: z.string(),
});

// Candidate entity as emitted by an extractor
export const CandidateEntitySchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  entity_type: z.string().min(1).default('concept'),
  metadata: MetadataSchema.default({}),
});

// Candidate relationship as emitted by an extractor. The type stays a free
// string here; the relationship typer maps unknown values to `generic`.
export const CandidateRelationshipSchema = z.object({
  source_entity_name: z.string().trim().min(1),
  target_entity_name: z.string().trim().min(1),
  description: z.string().default(''),
  relationship_type: z.string().default('generic'),
  confidence: z.number().min(0).max(1).default(0.8),
  metadata: MetadataSchema.default({}),
});

export const GraphFragmentSchema = z.object({
  entities: z.array(CandidateEntitySchema).default([]),
  relationships: z.array(CandidateRelationshipSchema).default([]),
});

// ============================================================================
// LLM Output Schemas - for validating LLM responses
// ============================================================================

// Unified extraction output: entities and typed relationships in one call
export const ExtractionOutputSchema = z.object({
  entities: z
    .array(
      z.object({
        name: z.string().min(1),
        description: z.string().default(''),
        entity_type: z.string().min(1).default('concept'),
        metadata: MetadataSchema.default({}),
      }),
    )
    .default([]),
  relationships: z
    .array(
      z.object({
        source_entity: z.string().min(1),
        target_entity: z.string().min(1),
        relationship_desc: z.string().default(''),
        relationship_type: z.string().default('generic'),
        confidence: z.number().min(0).max(1).default(0.8),
        metadata: MetadataSchema.default({}),
      }),
    )
    .default([]),
});

// ============================================================================
// Configuration Schemas - for validating config at runtime
// ============================================================================

export const FalkorDBConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  password: z.string().optional(),
  graphName: z.string().min(1),
});

export const LLMConfigSchema = z.object({
  provider: z.literal('openai'),
  model: z.string().min(1),
  apiKey: z.string().optional(),
  extractionMaxTokens: z.number().int().positive(),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.literal('openai'),
  model: z.string().min(1),
  dimensions: z.number().int().positive(),
});

/** Largest delay setTimeout honours */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const KnowledgeGraphConfigSchema = z.object({
  enableEnhancedKg: z
    .boolean()
    .describe('Master switch; when off every enhanced feature is off'),
  canonicalizationEnabled: z.boolean().default(true),
  typedRelationshipsEnabled: z.boolean().default(true),
  aliasTrackingEnabled: z.boolean().default(true),
  parallelProcessingEnabled: z.boolean().default(true),
  createSymmetricRelationships: z.boolean().default(true),
  entityDistanceThreshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe('Similarity floor for fuzzy entity merging (default 0.85)'),
  maxWorkers: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Worker pool size (default: CPU count + 4)'),
  // setTimeout clamps larger delays to 1ms
  chunkTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY_MS, `chunkTimeoutMs must be at most ${MAX_TIMER_DELAY_MS}`)
    .default(30000),
  minRelationshipConfidence: z.number().min(0).max(1).default(0.3),
  maxEdgesPerEntity: z.number().int().positive().default(50),
  preserveCaseEntities: z
    .array(z.string().min(1))
    .default(preservedCaseEntities)
    .describe('Names kept verbatim by normalization (acronyms)'),
  progressInterval: z.number().int().positive().default(10),
  entityCacheSize: z
    .number()
    .int()
    .min(0)
    .default(1000)
    .describe('Entities kept in the store lookup cache; 0 disables it'),
  enableCacheWarmup: z
    .boolean()
    .default(false)
    .describe('Fill the lookup cache from the store on connect'),
});

export const RetrievalConfigSchema = z.object({
  defaultDepth: z.number().int().min(0).max(10).default(2),
  maxSeeds: z.number().int().positive().default(10),
  hopDecay: z.number().gt(0).max(1).default(0.8),
  seedThreshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe('Seed similarity floor (default: entity similarity floor)'),
});

export const StorageBackendSchema = z.enum(['falkordb', 'memory']);

export const StorageConfigSchema = z.object({
  backend: StorageBackendSchema,
});

export const GraphweaveConfigSchema = z.object({
  falkordb: FalkorDBConfigSchema,
  llm: LLMConfigSchema,
  embeddings: EmbeddingsConfigSchema,
  knowledgeGraph: KnowledgeGraphConfigSchema,
  retrieval: RetrievalConfigSchema,
  storage: StorageConfigSchema,
});

// ============================================================================
// LLM Completion Options Schema
// ============================================================================

export const LLMCompletionOptionsSchema = z.object({
  prompt: z.string().min(1),
  responseFormat: z.enum(['text', 'json']).optional(),
  maxTokens: z.number().int().positive().optional(),
});

// ============================================================================
// Ingestion Schemas
// ============================================================================

export const IngestionRequestSchema = z.object({
  chunks: z.array(ChunkSchema),
  maxParallelism: z
    .number()
    .int('maxParallelism must be an integer')
    .positive('maxParallelism must be at least 1')
    .optional(),
});

// ============================================================================
// MCP Tool Input Schemas
// ============================================================================

export const IngestChunksSchema = z.object({
  chunks: z
    .array(
      z.object({
        id: z.string().min(1).describe('Chunk identifier'),
        text: z.string().describe('Chunk text'),
      }),
    )
    .describe('Chunks to ingest'),
  max_parallelism: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum chunks processed concurrently'),
});

export const IngestTextSchema = z.object({
  text: z.string().min(1).describe('Raw text to ingest as a single chunk'),
});

export const RetrieveGraphSchema = z.object({
  query: z.string().min(1).describe('Natural language query'),
  depth: z
    .number()
    .int()
    .min(0)
    .max(10)
    .optional()
    .describe('Maximum traversal depth in hops'),
  metadata_filters: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
    .optional()
    .describe('Exact-match filters on entity and relationship metadata'),
});

export const GetStatisticsSchema = z.object({});

export const ResetGraphSchema = z.object({
  confirm: z.literal(true).describe('Must be true to clear the graph'),
});

// ============================================================================
// Storage Schemas
// ============================================================================

export const ConnectionStateSchema = z.enum([
  'disconnected',
  'connecting',
  'connected',
  'error',
]);

export const GraphStatisticsSchema = z.object({
  entities: z.number().int().min(0),
  relationships: z.number().int().min(0),
  chunks: z.number().int().min(0),
  relationshipTypes: z.record(z.string(), z.number().int().min(0)),
});

// ============================================================================
// Server Configuration Schemas
// ============================================================================

export const HTTPServerOptionsSchema = z.object({
  port: z.number().int().min(0).max(65535).describe('Port to listen on'),
  host: z
    .string()
    .min(1)
    .optional()
    .describe('Host to bind to (default: 0.0.0.0)'),
  maxBodyBytes: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum request body size in bytes (default: 4 MiB)'),
});

export const HealthStatusSchema = z.object({
  status: z.enum(['ok', 'degraded', 'error']),
  storage: z.enum(['connected', 'disconnected']),
  backend: StorageBackendSchema,
  entities: z.number().int().min(0),
  uptime: z.number().int().min(0),
});

// ============================================================================
// Export inferred types from schemas
// ============================================================================

// Graph data types
export type RelationshipType = z.infer<typeof RelationshipTypeSchema>;
export type Metadata = z.infer<typeof MetadataSchema>;
export type Chunk = z.infer<typeof ChunkSchema>;
export type CandidateEntity = z.infer<typeof CandidateEntitySchema>;
export type CandidateRelationship = z.infer<
  typeof CandidateRelationshipSchema
>;
export type GraphFragment = z.infer<typeof GraphFragmentSchema>;
export type GraphFragmentInput = z.input<typeof GraphFragmentSchema>;
export type ExtractionOutput = z.infer<typeof ExtractionOutputSchema>;

// Config types
export type FalkorDBConfig = z.infer<typeof FalkorDBConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type KnowledgeGraphConfig = z.infer<typeof KnowledgeGraphConfigSchema>;
export type KnowledgeGraphConfigInput = z.input<
  typeof KnowledgeGraphConfigSchema
>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type StorageBackend = z.infer<typeof StorageBackendSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type GraphweaveConfig = z.infer<typeof GraphweaveConfigSchema>;

// Ingestion types
export type IngestionRequest = z.infer<typeof IngestionRequestSchema>;

// MCP Tool input types
export type IngestChunksInput = z.infer<typeof IngestChunksSchema>;
export type IngestTextInput = z.infer<typeof IngestTextSchema>;
export type RetrieveGraphInput = z.infer<typeof RetrieveGraphSchema>;
export type ResetGraphInput = z.infer<typeof ResetGraphSchema>;

// Storage types
export type ConnectionState = z.infer<typeof ConnectionStateSchema>;
export type GraphStatistics = z.infer<typeof GraphStatisticsSchema>;

// Server types
export type HTTPServerOptions = z.infer<typeof HTTPServerOptionsSchema>;
export type HealthStatus = z.infer<typeof HealthStatusSchema>;
