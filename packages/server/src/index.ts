// graphweave server - MCP tools over Streamable HTTP

export * from './errors.js';
export { HealthChecker } from './health.js';
export { DEFAULT_MAX_BODY_BYTES, HTTPTransport } from './http.js';
export { createMcpServer } from './mcp-server-factory.js';
export {
  SharedResources,
  type SharedResourcesOverrides,
} from './shared-resources.js';

export const VERSION = '0.1.0';
