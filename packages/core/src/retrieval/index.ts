// Query-time retrieval

export {
  isRetrievalError,
  QueryEmbeddingError,
  RetrievalError,
  RetrievalValidationError,
  TraversalError,
} from './errors.js';
export type { WeightedRetrieverOptions } from './weighted-retriever.js';
export { matchesFilters, WeightedRetriever } from './weighted-retriever.js';
