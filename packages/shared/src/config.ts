// Configuration types and validation for graphweave
import { cpus } from 'node:os';
import type { ZodError } from 'zod';
import {
  type EmbeddingsConfig,
  EmbeddingsConfigSchema,
  type FalkorDBConfig,
  FalkorDBConfigSchema,
  type GraphweaveConfig,
  GraphweaveConfigSchema,
  type HTTPServerOptions,
  HTTPServerOptionsSchema,
  type KnowledgeGraphConfig,
  KnowledgeGraphConfigSchema,
  type LLMConfig,
  LLMConfigSchema,
  type RetrievalConfig,
  RetrievalConfigSchema,
} from './schemas.js';

// Re-export config types from schemas
export type {
  FalkorDBConfig,
  LLMConfig,
  EmbeddingsConfig,
  KnowledgeGraphConfig,
  RetrievalConfig,
  GraphweaveConfig,
  HTTPServerOptions,
};

/** Similarity floor used for fuzzy merging when none is configured */
export const DEFAULT_ENTITY_SIMILARITY_THRESHOLD = 0.85;

/** Cosine distance ceiling used when the enhanced graph is switched off */
export const LEGACY_ENTITY_DISTANCE_THRESHOLD = 0.1;

export type KnowledgeGraphFeature =
  | 'canonicalization'
  | 'typed_relationships'
  | 'alias_tracking'
  | 'parallel_processing'
  | 'symmetric_relationships';

/**
 * Deep-partial overrides accepted by loadConfig
 */
export type ConfigOverrides = {
  [K in keyof GraphweaveConfig]?: Partial<GraphweaveConfig[K]>;
};

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ZodError['errors'],
  ) {
    super(message);
    this.name = 'ConfigValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return this.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

/**
 * Parse environment variable as a valid port number
 */
function parseEnvPort(envVar: string | undefined, defaultPort: number): number {
  if (!envVar) return defaultPort;
  const port = Number.parseInt(envVar, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    return defaultPort;
  }
  return port;
}

/**
 * Parse a boolean flag; accepts true/1/yes/on case-insensitively
 */
function parseEnvBoolean(
  envVar: string | undefined,
  defaultValue: boolean,
): boolean {
  if (envVar === undefined || envVar.trim() === '') return defaultValue;
  return ['true', '1', 'yes', 'on'].includes(envVar.trim().toLowerCase());
}

// Invalid numbers are passed through as NaN so validation reports them
function parseEnvNumber(envVar: string | undefined): number | undefined {
  if (envVar === undefined || envVar.trim() === '') return undefined;
  return Number(envVar);
}

/**
 * Build raw configuration from environment variables
 * This creates an unvalidated config object
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    falkordb: {
      host: process.env.FALKORDB_HOST || 'localhost',
      port: parseEnvPort(process.env.FALKORDB_PORT, 6379),
      password: process.env.FALKORDB_PASSWORD,
      graphName: process.env.FALKORDB_GRAPH || 'graphweave',
    },
    llm: {
      provider: 'openai',
      model: process.env.LLM_MODEL || 'gpt-4o-mini',
      apiKey: process.env.OPENAI_API_KEY,
      extractionMaxTokens: 2000,
    },
    embeddings: {
      provider: 'openai',
      model: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
      dimensions: 1536,
    },
    knowledgeGraph: {
      enableEnhancedKg: parseEnvBoolean(process.env.ENABLE_ENHANCED_KG, false),
      entityDistanceThreshold: parseEnvNumber(
        process.env.KG_ENTITY_DISTANCE_THRESHOLD,
      ),
      maxWorkers: parseEnvNumber(process.env.KG_MAX_WORKERS),
      chunkTimeoutMs: parseEnvNumber(process.env.KG_CHUNK_TIMEOUT_MS),
      minRelationshipConfidence: parseEnvNumber(
        process.env.KG_MIN_RELATIONSHIP_CONFIDENCE,
      ),
      maxEdgesPerEntity: parseEnvNumber(process.env.KG_MAX_EDGES_PER_ENTITY),
      entityCacheSize: parseEnvNumber(process.env.ENTITY_CACHE_SIZE),
      enableCacheWarmup: parseEnvBoolean(
        process.env.ENABLE_CACHE_WARMUP,
        false,
      ),
    },
    retrieval: {
      seedThreshold: parseEnvNumber(process.env.KG_SEED_THRESHOLD),
    },
    storage: {
      backend: process.env.GRAPH_STORAGE_BACKEND || 'falkordb',
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge configuration objects; undefined override values are skipped
 */
function deepMerge(
  base: Record<string, unknown>,
  overrides: object | undefined,
): Record<string, unknown> {
  if (!overrides) return base;

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(current)
        ? deepMerge(current, value)
        : value;
  }
  return result;
}

// Drop undefined leaves so zod defaults apply to unset env vars
function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    result[key] = isPlainObject(entry) ? stripUndefined(entry) : entry;
  }
  return result;
}

/**
 * Load and validate configuration
 * @throws {ConfigValidationError} When configuration is invalid
 */
export function loadConfig(overrides?: ConfigOverrides): GraphweaveConfig {
  const merged = deepMerge(stripUndefined(buildRawConfig()), overrides);

  const result = GraphweaveConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
      result.error.errors,
    );
  }

  return result.data;
}

/**
 * Default configuration (validated)
 */
export const DEFAULT_CONFIG: GraphweaveConfig = loadConfig();

/**
 * Validate a partial FalkorDB config
 */
export function validateFalkorDBConfig(config: unknown): FalkorDBConfig {
  const result = FalkorDBConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid FalkorDB configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate a partial LLM config
 */
export function validateLLMConfig(config: unknown): LLMConfig {
  const result = LLMConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid LLM configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate a partial embeddings config
 */
export function validateEmbeddingsConfig(config: unknown): EmbeddingsConfig {
  const result = EmbeddingsConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid embeddings configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate knowledge graph settings, filling in defaults
 */
export function validateKnowledgeGraphConfig(
  config: unknown,
): KnowledgeGraphConfig {
  const result = KnowledgeGraphConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid knowledge graph configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate retrieval settings, filling in defaults
 */
export function validateRetrievalConfig(config: unknown): RetrievalConfig {
  const result = RetrievalConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid retrieval configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate HTTP server options
 */
export function validateHTTPServerOptions(config: unknown): HTTPServerOptions {
  const result = HTTPServerOptionsSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid HTTP server options: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

// ============================================================================
// Feature helpers
// ============================================================================

/**
 * Whether an enhanced feature is active. Every feature is off while the
 * master switch is off.
 */
export function isFeatureEnabled(
  config: KnowledgeGraphConfig,
  feature: KnowledgeGraphFeature,
): boolean {
  if (!config.enableEnhancedKg) return false;

  switch (feature) {
    case 'canonicalization':
      return config.canonicalizationEnabled;
    case 'typed_relationships':
      return config.typedRelationshipsEnabled;
    case 'alias_tracking':
      return config.aliasTrackingEnabled;
    case 'parallel_processing':
      return config.parallelProcessingEnabled;
    case 'symmetric_relationships':
      return config.createSymmetricRelationships;
  }
}

/**
 * Entity threshold in effect: the legacy distance ceiling when the enhanced
 * graph is off, otherwise the configured similarity floor.
 */
export function getEffectiveThreshold(config: KnowledgeGraphConfig): number {
  if (!config.enableEnhancedKg) return LEGACY_ENTITY_DISTANCE_THRESHOLD;
  return config.entityDistanceThreshold ?? DEFAULT_ENTITY_SIMILARITY_THRESHOLD;
}

/**
 * Cosine similarity floor for fuzzy merging and seed selection.
 * The legacy threshold is a distance, so it is converted (1 - 0.1 = 0.9).
 */
export function getSimilarityFloor(config: KnowledgeGraphConfig): number {
  const threshold = getEffectiveThreshold(config);
  return config.enableEnhancedKg ? threshold : 1 - threshold;
}

/**
 * Worker pool size: configured value, or CPU count + 4
 */
export function getWorkerCount(config: KnowledgeGraphConfig): number {
  return config.maxWorkers ?? cpus().length + 4;
}
