// HTTP transport handler for MCP over Streamable HTTP
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  type HTTPServerOptions,
  HTTPServerOptionsSchema,
} from '@graphweave/shared';
import {
  RequestBodyError,
  ServerStartError,
  ServerStopError,
  TransportConfigError,
  wrapServerError,
} from './errors.js';
import { createMcpServer } from './mcp-server-factory.js';
import type { SharedResources } from './shared-resources.js';

export type { HTTPServerOptions };

export const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;

// JSON-RPC error codes used before a request reaches the MCP server
const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const SERVER_ERROR = -32000;

/**
 * HTTP Transport for MCP Server
 *
 * Stateless Streamable HTTP: every POST gets its own McpServer and transport,
 * both backed by the same SharedResources, and both closed with the response.
 */
export class HTTPTransport {
  private server: Server | null = null;
  private sharedResources: SharedResources | null = null;
  private readonly validatedOptions: HTTPServerOptions;

  /**
   * Create a new HTTP transport
   * @throws {TransportConfigError} if options are invalid
   */
  constructor(options: HTTPServerOptions) {
    const result = HTTPServerOptionsSchema.safeParse(options);
    if (!result.success) {
      const errorMessages = result.error.issues
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new TransportConfigError(
        `Invalid HTTP transport options:\n${errorMessages}`,
      );
    }
    this.validatedOptions = result.data;
  }

  attachResources(resources: SharedResources): void {
    this.sharedResources = resources;
  }

  hasResources(): boolean {
    return this.sharedResources !== null;
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start the HTTP server
   * @throws {ServerStartError} if server fails to start
   */
  async start(): Promise<void> {
    if (!this.sharedResources) {
      throw new ServerStartError(
        'No resources attached. Call attachResources() first.',
      );
    }

    if (this.isRunning()) {
      return;
    }

    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    const host = this.validatedOptions.host ?? '0.0.0.0';
    const port = this.validatedOptions.port;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', (err) => {
          reject(
            new ServerStartError(
              `Failed to start HTTP server on ${host}:${port}: ${err.message}`,
              err,
            ),
          );
        });
        server.listen(port, host, () => {
          resolve();
        });
      });
      this.server = server;
    } catch (error) {
      if (error instanceof ServerStartError) {
        throw error;
      }
      throw new ServerStartError(
        `Failed to start HTTP transport: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Stop the HTTP server
   * @throws {ServerStopError} if shutdown fails
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    } catch (error) {
      throw new ServerStopError(
        `Errors during HTTP transport shutdown: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Handle an incoming HTTP request
   */
  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');

      if (url.pathname === '/health') {
        await this.handleHealthCheck(req, res);
        return;
      }

      if (url.pathname === '/mcp' || url.pathname === '/') {
        await this.handleMCPRequest(req, res);
        return;
      }

      this.sendJsonResponse(res, 404, { error: 'Not found' });
    } catch (error) {
      console.error('Unhandled error in request handler:', error);
      if (!res.headersSent) {
        this.sendJsonResponse(res, 500, {
          error: 'Internal server error',
        });
      }
    }
  }

  /**
   * Handle MCP protocol requests
   */
  private async handleMCPRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    const resources = this.sharedResources;
    if (!resources) {
      this.sendJsonRpcError(res, 503, SERVER_ERROR, 'Resources not attached');
      return;
    }

    // No sessions, so no server-initiated stream to open or terminate
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      this.sendJsonRpcError(res, 405, SERVER_ERROR, 'Method not allowed.');
      return;
    }

    let body: unknown;
    try {
      body = await this.parseBody(req);
    } catch (error) {
      if (error instanceof RequestBodyError) {
        this.sendJsonRpcError(
          res,
          error.statusCode,
          error.statusCode === 413 ? INVALID_REQUEST : PARSE_ERROR,
          error.message,
        );
        return;
      }
      throw error;
    }

    const mcpServer = createMcpServer(resources);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        console.error('Error closing MCP transport:', error);
      });
      mcpServer.close().catch((error: unknown) => {
        console.error('Error closing MCP server:', error);
      });
    });

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        this.sendJsonRpcError(
          res,
          500,
          SERVER_ERROR,
          error instanceof Error ? error.message : 'Internal server error',
        );
      }
    }
  }

  /**
   * Handle health check requests
   */
  private async handleHealthCheck(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    if (req.method !== 'GET') {
      this.sendJsonResponse(res, 405, { error: 'Method not allowed' });
      return;
    }

    const resources = this.sharedResources;
    try {
      if (!resources) {
        throw new ServerStartError('Resources not attached');
      }
      const health = await resources.getHealth();
      const statusCode =
        health.status === 'ok' ? 200 : health.status === 'degraded' ? 503 : 500;

      this.sendJsonResponse(res, statusCode, health);
    } catch (error) {
      const wrappedError = wrapServerError(error, 'Health check failed');
      console.error('Health check error:', wrappedError);

      this.sendJsonResponse(res, 500, {
        status: 'error',
        storage: 'disconnected',
        backend: resources?.getConfig().storage.backend ?? null,
        entities: 0,
        uptime: 0,
        error: wrappedError.message,
      });
    }
  }

  /**
   * Read the request body as JSON
   * @throws {RequestBodyError} if the body is empty, too large or not JSON
   */
  private parseBody(req: IncomingMessage): Promise<unknown> {
    const maxBodyBytes =
      this.validatedOptions.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalSize = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) {
          return;
        }
        totalSize += chunk.length;
        if (totalSize > maxBodyBytes) {
          rejected = true;
          chunks.length = 0;
          reject(
            new RequestBodyError(
              `Request body exceeds ${maxBodyBytes} bytes`,
              413,
            ),
          );
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (rejected) {
          return;
        }
        const body = Buffer.concat(chunks).toString('utf-8');
        if (!body) {
          reject(new RequestBodyError('Empty request body', 400));
          return;
        }

        try {
          resolve(JSON.parse(body));
        } catch (error) {
          reject(
            new RequestBodyError(
              'Invalid JSON body',
              400,
              error instanceof Error ? error : undefined,
            ),
          );
        }
      });

      req.on('error', (error) => {
        reject(new Error(`Request error: ${error.message}`));
      });
    });
  }

  private sendJsonRpcError(
    res: ServerResponse,
    statusCode: number,
    code: number,
    message: string,
  ): void {
    this.sendJsonResponse(res, statusCode, {
      jsonrpc: '2.0',
      error: { code, message },
      id: null,
    });
  }

  private sendJsonResponse(
    res: ServerResponse,
    statusCode: number,
    data: unknown,
  ): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const address = this.server.address();
    if (typeof address === 'string' || address === null) return null;
    return { host: address.address, port: address.port };
  }

  getOptions(): HTTPServerOptions {
    return this.validatedOptions;
  }
}
