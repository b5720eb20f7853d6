#!/usr/bin/env node
// graphweave server entry point
import { loadConfig } from '@graphweave/shared';
import { HTTPTransport } from './http.js';
import { SharedResources } from './shared-resources.js';

const DEFAULT_PORT = 3000;

async function main(): Promise<void> {
  const config = loadConfig();

  // Parse command line args for port
  const portArg = process.argv.find((arg) => arg.startsWith('--port='));
  const port = portArg
    ? Number.parseInt(portArg.split('=')[1], 10)
    : Number.parseInt(process.env.PORT ?? String(DEFAULT_PORT), 10);

  const resources = new SharedResources(config);
  const transport = new HTTPTransport({ port, host: process.env.HOST || undefined });
  transport.attachResources(resources);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\nReceived ${signal}, shutting down...`);
    try {
      await transport.stop();
      await resources.stop();
      console.log('Server stopped gracefully');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  const backend = config.storage.backend;
  try {
    console.log(`Connecting to ${backend} store...`);
    await resources.start();
    console.log(`Connected to ${backend} store`);

    console.log(`Starting HTTP server on port ${port}...`);
    await transport.start();

    const address = transport.getAddress();
    console.log(
      `graphweave server running at http://${address?.host}:${address?.port}`,
    );
    console.log('Endpoints:');
    console.log(`  - MCP: http://${address?.host}:${address?.port}/mcp`);
    console.log(`  - Health: http://${address?.host}:${address?.port}/health`);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
