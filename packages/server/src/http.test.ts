import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ServerStartError, TransportConfigError } from './errors.js';
import { HTTPTransport } from './http.js';
import type { SharedResources } from './shared-resources.js';
import { createTestResources, RAFT_TEXT } from './test-helpers.js';

const HOST = '127.0.0.1';

const INITIALIZE_REQUEST = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

const MCP_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json, text/event-stream',
};

describe('HTTPTransport', () => {
  describe('constructor', () => {
    it('should accept port 0 for an ephemeral port', () => {
      expect(new HTTPTransport({ port: 0 }).getOptions()).toEqual({ port: 0 });
    });

    it('should throw TransportConfigError for negative port', () => {
      expect(() => new HTTPTransport({ port: -1 })).toThrow(
        TransportConfigError,
      );
    });

    it('should throw TransportConfigError for port > 65535', () => {
      expect(() => new HTTPTransport({ port: 99999 })).toThrow(
        'Invalid HTTP transport options:\n  - port:',
      );
    });

    it('should throw TransportConfigError for empty host', () => {
      expect(() => new HTTPTransport({ port: 3000, host: '' })).toThrow(
        TransportConfigError,
      );
    });

    it('should throw TransportConfigError for a zero body limit', () => {
      expect(() => new HTTPTransport({ port: 3000, maxBodyBytes: 0 })).toThrow(
        TransportConfigError,
      );
    });
  });

  describe('lifecycle', () => {
    let resources: SharedResources;

    beforeEach(async () => {
      resources = createTestResources();
      await resources.start();
    });

    afterEach(async () => {
      await resources.stop();
    });

    it('should throw ServerStartError if started without resources', async () => {
      const transport = new HTTPTransport({ port: 0, host: HOST });
      expect(transport.hasResources()).toBe(false);
      await expect(transport.start()).rejects.toThrow(ServerStartError);
    });

    it('should start and stop successfully', async () => {
      const transport = new HTTPTransport({ port: 0, host: HOST });
      transport.attachResources(resources);
      expect(transport.isRunning()).toBe(false);
      expect(transport.getAddress()).toBeNull();

      await transport.start();
      expect(transport.isRunning()).toBe(true);
      expect(transport.getAddress()).toMatchObject({ host: HOST });
      expect(transport.getAddress()?.port).toBeGreaterThan(0);

      await transport.stop();
      expect(transport.isRunning()).toBe(false);
      expect(transport.getAddress()).toBeNull();
    });

    it('should be idempotent - multiple start() calls keep one server', async () => {
      const transport = new HTTPTransport({ port: 0, host: HOST });
      transport.attachResources(resources);

      await transport.start();
      const port = transport.getAddress()?.port;
      await transport.start();

      expect(transport.getAddress()?.port).toBe(port);
      await transport.stop();
    });

    it('should handle stop() when not running', async () => {
      const transport = new HTTPTransport({ port: 0, host: HOST });
      await transport.stop();
      expect(transport.isRunning()).toBe(false);
    });

    it('should fail to start on a port already in use', async () => {
      const first = new HTTPTransport({ port: 0, host: HOST });
      first.attachResources(resources);
      await first.start();

      const second = new HTTPTransport({
        port: first.getAddress()?.port ?? 0,
        host: HOST,
      });
      second.attachResources(resources);

      await expect(second.start()).rejects.toThrow(ServerStartError);
      expect(second.isRunning()).toBe(false);
      await first.stop();
    });
  });

  describe('endpoints', () => {
    let resources: SharedResources;
    let transport: HTTPTransport;
    let baseUrl: string;

    beforeEach(async () => {
      resources = createTestResources();
      await resources.start();
      transport = new HTTPTransport({ port: 0, host: HOST, maxBodyBytes: 1024 });
      transport.attachResources(resources);
      await transport.start();
      baseUrl = `http://${HOST}:${transport.getAddress()?.port}`;
    });

    afterEach(async () => {
      await transport.stop();
      await resources.stop();
    });

    describe('health', () => {
      it('should respond to GET /health', async () => {
        const response = await fetch(`${baseUrl}/health`);

        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({
          status: 'ok',
          storage: 'connected',
          backend: 'memory',
          entities: 0,
        });
      });

      it('should return 500 when storage is down', async () => {
        await resources.stop();

        const response = await fetch(`${baseUrl}/health`);

        expect(response.status).toBe(500);
        expect(await response.json()).toMatchObject({
          status: 'error',
          storage: 'disconnected',
        });
      });

      it('should return 405 for non-GET health requests', async () => {
        const response = await fetch(`${baseUrl}/health`, { method: 'POST' });
        expect(response.status).toBe(405);
      });

      it('should return 404 for unknown paths', async () => {
        const response = await fetch(`${baseUrl}/unknown`);

        expect(response.status).toBe(404);
        expect(await response.json()).toEqual({ error: 'Not found' });
      });
    });

    describe('MCP', () => {
      it('should answer initialize with JSON', async () => {
        const response = await fetch(`${baseUrl}/mcp`, {
          method: 'POST',
          headers: MCP_HEADERS,
          body: JSON.stringify(INITIALIZE_REQUEST),
        });

        expect(response.status).toBe(200);
        expect(response.headers.get('content-type')).toContain(
          'application/json',
        );
        expect(await response.json()).toMatchObject({
          jsonrpc: '2.0',
          id: 1,
          result: { serverInfo: { name: 'graphweave' } },
        });
      });

      it('should serve the root path as well', async () => {
        const response = await fetch(`${baseUrl}/`, {
          method: 'POST',
          headers: MCP_HEADERS,
          body: JSON.stringify(INITIALIZE_REQUEST),
        });
        expect(response.status).toBe(200);
      });

      it('should return 405 for GET /mcp', async () => {
        const response = await fetch(`${baseUrl}/mcp`);

        expect(response.status).toBe(405);
        expect(response.headers.get('allow')).toBe('POST');
      });

      it('should reject an empty body', async () => {
        const response = await fetch(`${baseUrl}/mcp`, {
          method: 'POST',
          headers: MCP_HEADERS,
        });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          jsonrpc: '2.0',
          error: { code: -32700, message: 'Empty request body' },
          id: null,
        });
      });

      it('should reject invalid JSON body', async () => {
        const response = await fetch(`${baseUrl}/mcp`, {
          method: 'POST',
          headers: MCP_HEADERS,
          body: 'not valid json {',
        });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          jsonrpc: '2.0',
          error: { code: -32700, message: 'Invalid JSON body' },
          id: null,
        });
      });

      it('should reject bodies over the configured limit', async () => {
        const response = await fetch(`${baseUrl}/mcp`, {
          method: 'POST',
          headers: MCP_HEADERS,
          body: JSON.stringify({ padding: 'x'.repeat(2048) }),
        });

        expect(response.status).toBe(413);
        expect(await response.json()).toEqual({
          jsonrpc: '2.0',
          error: { code: -32600, message: 'Request body exceeds 1024 bytes' },
          id: null,
        });
      });

      it('should serve tool calls to an MCP client', async () => {
        const client = new Client({ name: 'test-client', version: '0.0.0' });
        await client.connect(
          new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`)),
        );

        try {
          const ingest = CallToolResultSchema.parse(
            await client.callTool({
              name: 'ingest_text',
              arguments: { text: RAFT_TEXT },
            }),
          );
          expect(ingest.structuredContent).toMatchObject({
            result: { status: 'processed' },
          });

          const stats = CallToolResultSchema.parse(
            await client.callTool({ name: 'get_statistics', arguments: {} }),
          );
          expect(stats.structuredContent).toMatchObject({
            statistics: { entities: 2, relationships: 1 },
          });
        } finally {
          await client.close();
        }
      });
    });
  });
});
