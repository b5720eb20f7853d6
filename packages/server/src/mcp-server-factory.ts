// MCP Server Factory - Creates configured McpServer instances with all tools registered
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  type ChunkResult,
  GetStatisticsSchema,
  IngestChunksSchema,
  IngestTextSchema,
  ResetGraphSchema,
  type RetrievedKnowledgeGraph,
  RetrieveGraphSchema,
} from '@graphweave/shared';
import { formatToolError } from './errors.js';
import type { SharedResources } from './shared-resources.js';

const SERVER_VERSION = '0.1.0';

/**
 * Create a new McpServer instance with all tools registered.
 * Each request gets its own McpServer instance that shares the underlying resources.
 */
export function createMcpServer(resources: SharedResources): McpServer {
  const mcpServer = new McpServer(
    {
      name: 'graphweave',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions:
        'Typed knowledge graph server: ingest text chunks into a canonical entity graph and retrieve weighted subgraphs for natural language queries.',
    },
  );

  registerIngestChunksTool(mcpServer, resources);
  registerIngestTextTool(mcpServer, resources);
  registerRetrieveGraphTool(mcpServer, resources);
  registerStatisticsTool(mcpServer, resources);
  registerResetGraphTool(mcpServer, resources);

  return mcpServer;
}

function summarizeResults(results: ChunkResult[]): string {
  const counts = { processed: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.status]++;
  }
  const lines = [
    `Ingested ${results.length} chunks: ${counts.processed} processed, ${counts.skipped} skipped, ${counts.failed} failed`,
  ];
  for (const result of results) {
    if (result.status === 'failed') {
      const label = result.retryable ? `${result.kind}, retryable` : result.kind;
      lines.push(`  - ${result.chunk_id} (${label}): ${result.message}`);
    }
  }
  return lines.join('\n');
}

/**
 * Embeddings are large and meaningless to a client
 */
function withoutEmbeddings(graph: RetrievedKnowledgeGraph) {
  return {
    query: graph.query,
    entities: graph.entities.map(({ entity, score, depth }) => {
      const { embedding: _embedding, ...rest } = entity;
      return { ...rest, score, depth };
    }),
    relationships: graph.relationships.map(({ relationship, score }) => ({
      ...relationship,
      score,
    })),
  };
}

// ============================================================================
// Ingestion Tools
// ============================================================================

function registerIngestChunksTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'ingest_chunks',
    {
      title: 'Ingest chunks',
      description:
        'Extract entities and typed relationships from text chunks and merge them into the knowledge graph. Already processed chunks are skipped.',
      inputSchema: IngestChunksSchema.shape,
    },
    async (args) => {
      try {
        const results = await resources.index.addChunks(
          args.chunks,
          args.max_parallelism,
        );
        return {
          content: [
            {
              type: 'text' as const,
              text: summarizeResults(results),
            },
          ],
          structuredContent: { results },
        };
      } catch (error) {
        return formatToolError(error, 'ingest_chunks');
      }
    },
  );
}

function registerIngestTextTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'ingest_text',
    {
      title: 'Ingest text',
      description:
        'Ingest a single piece of text. The chunk id is derived from the text, so ingesting the same text twice is a no-op.',
      inputSchema: IngestTextSchema.shape,
    },
    async (args) => {
      try {
        const result = await resources.index.addText(args.text);
        return {
          content: [
            {
              type: 'text' as const,
              text: summarizeResults([result]),
            },
          ],
          structuredContent: { result },
        };
      } catch (error) {
        return formatToolError(error, 'ingest_text');
      }
    },
  );
}

// ============================================================================
// Retrieval Tools
// ============================================================================

function registerRetrieveGraphTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'retrieve_graph',
    {
      title: 'Retrieve graph',
      description:
        'Find the entities most similar to a query and expand them along weighted relationships. Returns scored entities and relationships.',
      inputSchema: RetrieveGraphSchema.shape,
    },
    async (args) => {
      try {
        const graph = withoutEmbeddings(
          await resources.index.retrieve(
            args.query,
            args.depth,
            args.metadata_filters,
          ),
        );
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(graph, null, 2),
            },
          ],
          structuredContent: graph,
        };
      } catch (error) {
        return formatToolError(error, 'retrieve_graph');
      }
    },
  );
}

// ============================================================================
// Management Tools
// ============================================================================

function registerStatisticsTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'get_statistics',
    {
      title: 'Graph statistics',
      description:
        'Get entity, relationship and chunk counts, relationship type distribution and typed coverage',
      inputSchema: GetStatisticsSchema.shape,
    },
    async () => {
      try {
        const statistics = await resources.index.getStatistics();
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(statistics, null, 2),
            },
          ],
          structuredContent: { statistics },
        };
      } catch (error) {
        return formatToolError(error, 'get_statistics');
      }
    },
  );
}

function registerResetGraphTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'reset_graph',
    {
      title: 'Reset graph',
      description:
        'Delete every entity and relationship from the knowledge graph. Use with caution!',
      inputSchema: ResetGraphSchema.shape,
    },
    async () => {
      try {
        await resources.index.reset();
        return {
          content: [
            {
              type: 'text' as const,
              text: 'Knowledge graph cleared successfully',
            },
          ],
        };
      } catch (error) {
        return formatToolError(error, 'reset_graph');
      }
    },
  );
}
