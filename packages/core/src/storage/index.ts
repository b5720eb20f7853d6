// Graph stores and types
export { EntityCache } from './entity-cache.js';
export {
  DEFAULT_ENTITY_CACHE_SIZE,
  FalkorDBGraphStore,
  type FalkorDBStoreOptions,
} from './falkordb.js';
export { InMemoryGraphStore } from './memory.js';
export { StagedTransaction } from './staged-transaction.js';
export { parseEntityRow, parseRelationshipRow } from './parsers.js';

// Storage interface for abstraction
export type {
  GraphReader,
  GraphStore,
  GraphTransaction,
  SimilarEntity,
  StagedChanges,
} from './interface.js';

// Error types
export {
  StorageError,
  StorageConfigError,
  StorageParseError,
  ConnectionError,
  QueryError,
  TransactionStateError,
  isStorageError,
} from './errors.js';
