// Prompt templates for LLM agents
import { RelationshipTypeSchema } from '@graphweave/shared';

const RELATIONSHIP_TYPES = RelationshipTypeSchema.options.join(', ');

/**
 * Single-call entity and typed relationship extraction.
 * Placeholder: {text}
 */
export const GRAPH_EXTRACTION_PROMPT = `You build a knowledge graph from text.

Read the text below and extract:
1. ENTITIES: the concepts, products, people, organisations and terms it is about.
   Use the shortest name that identifies the entity, keep acronyms as written,
   and give each a one-sentence description and a short lowercase entity_type.
2. RELATIONSHIPS between extracted entities. Use entity names exactly as
   extracted. Pick relationship_type from: ${RELATIONSHIP_TYPES}.
   - hypernym: source is a broader category of target
   - hyponym: source is a kind of target
   - meronym / holonym: source is part of / contains target
   - synonym / antonym: same or opposite meaning
   - causal: source causes or leads to target
   - dependency: source requires target
   - temporal: source happens before target
   - reference: source mentions or cites target
   - generic: anything else
   Give each relationship a confidence between 0 and 1.

Respond in JSON format:
{
  "entities": [
    {"name": "...", "description": "...", "entity_type": "...", "metadata": {}}
  ],
  "relationships": [
    {
      "source_entity": "...",
      "target_entity": "...",
      "relationship_desc": "...",
      "relationship_type": "...",
      "confidence": 0.0-1.0,
      "metadata": {}
    }
  ]
}

Return empty arrays when the text has nothing worth extracting.

Text:
{text}`;
