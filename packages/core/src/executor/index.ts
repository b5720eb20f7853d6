// Chunk ingestion

export {
  ChunkError,
  ChunkExtractionError,
  ChunkStorageError,
  ChunkTimeoutError,
  describeError,
  IngestionError,
  SchedulerValidationError,
  WorkerPoolClosedError,
} from './errors.js';
export type { IngestionSchedulerOptions } from './ingestion-scheduler.js';
export { IngestionScheduler } from './ingestion-scheduler.js';
export { WorkerPool } from './worker-pool.js';
