// LLM-powered agents
export type { LLMGraphExtractorOptions } from './graph-extractor.js';
export {
  EXTRACTION_METHOD,
  LLMGraphExtractor,
  toFragment,
} from './graph-extractor.js';
export * from './prompts.js';

// Export error types
export {
  AgentError,
  GraphExtractionError,
  LLMResponseParseError,
  LLMResponseValidationError,
} from './errors.js';
