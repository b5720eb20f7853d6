// Knowledge graph mutation: canonicalization, typing and the mutation gate
export {
  CANONICAL_DESCRIPTION_PREFIX,
  Canonicalizer,
  computeCanonicalId,
  embeddingText,
  normalizeEntityName,
} from './canonicalizer.js';
export type { MergeCandidate } from './canonicalizer.js';
export {
  isSymmetricRelationship,
  parseRelationshipType,
  RELATIONSHIP_BASE_WEIGHTS,
  RelationshipTyper,
  relationshipWeight,
  WEIGHT_SCALE,
} from './relationship-typer.js';
export {
  GLOBAL_LOCK_KEY,
  GraphMutationGate,
  relationshipId,
} from './mutation-gate.js';
export type {
  ApplyResult,
  DroppedCounts,
  MutationGateOptions,
} from './mutation-gate.js';
export { KeyedLock } from './keyed-lock.js';
export { cosineSimilarity } from './similarity.js';

// Graph errors - for MCP to catch and display appropriately
export {
  GraphError,
  FragmentValidationError,
  MutationError,
  isGraphError,
} from './errors.js';
