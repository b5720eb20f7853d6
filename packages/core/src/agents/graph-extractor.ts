// Graph Extractor - one LLM call per chunk yielding entities and typed relationships
import {
  type ExtractionOutput,
  ExtractionOutputSchema,
  type ExtractOptions,
  type GraphExtractor,
  type GraphFragment,
  type LLMProvider,
} from '@graphweave/shared';
import {
  GraphExtractionError,
  LLMResponseParseError,
  LLMResponseValidationError,
} from './errors.js';
import { GRAPH_EXTRACTION_PROMPT } from './prompts.js';

export const EXTRACTION_METHOD = 'llm_unified';

export interface LLMGraphExtractorOptions {
  maxTokens?: number;
}

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

export class LLMGraphExtractor implements GraphExtractor {
  private readonly maxTokens: number;

  constructor(
    private llm: LLMProvider,
    options: LLMGraphExtractorOptions = {},
  ) {
    this.maxTokens = options.maxTokens ?? 2000;
  }

  /**
   * Extract a graph fragment from chunk text
   *
   * @throws {GraphExtractionError} When the LLM call fails
   * @throws {LLMResponseParseError} When LLM response is not valid JSON
   * @throws {LLMResponseValidationError} When LLM response fails schema validation
   */
  async extract(text: string, options?: ExtractOptions): Promise<GraphFragment> {
    if (text.trim().length === 0) {
      return { entities: [], relationships: [] };
    }

    let response: string;
    try {
      response = await this.llm.complete({
        prompt: GRAPH_EXTRACTION_PROMPT.replace('{text}', () => text),
        responseFormat: 'json',
        maxTokens: this.maxTokens,
        signal: options?.signal,
      });
    } catch (error) {
      throw new GraphExtractionError(
        'Failed to get LLM response for graph extraction',
        error instanceof Error ? error : undefined,
      );
    }

    return toFragment(this.parseAndValidate(response));
  }

  /**
   * Parse and validate the LLM response using Zod schema
   */
  private parseAndValidate(response: string): ExtractionOutput {
    const body = response.trim().match(CODE_FENCE)?.[1] ?? response;

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new LLMResponseParseError(
        'LLM response is not valid JSON',
        response,
        error instanceof Error ? error : undefined,
      );
    }

    const result = ExtractionOutputSchema.safeParse(parsed);
    if (!result.success) {
      throw new LLMResponseValidationError(
        `LLM response failed schema validation:\n${result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
        response,
        result.error.issues,
      );
    }

    return result.data;
  }
}

/**
 * Map the extraction wire format onto a graph fragment, tagging provenance
 */
export function toFragment(output: ExtractionOutput): GraphFragment {
  return {
    entities: output.entities.map((entity) => ({
      name: entity.name,
      description: entity.description,
      entity_type: entity.entity_type,
      metadata: { ...entity.metadata, extraction_method: EXTRACTION_METHOD },
    })),
    relationships: output.relationships.map((rel) => ({
      source_entity_name: rel.source_entity,
      target_entity_name: rel.target_entity,
      description: rel.relationship_desc,
      relationship_type: rel.relationship_type,
      confidence: rel.confidence,
      metadata: {
        ...rel.metadata,
        extraction_method: EXTRACTION_METHOD,
        typed_extraction: true,
      },
    })),
  };
}
