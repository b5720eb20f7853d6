// Health check endpoint
import type { GraphStore } from '@graphweave/core';
import type { HealthStatus, StorageBackend } from '@graphweave/shared';

export class HealthChecker {
  private startTime: number;

  constructor(
    private store: GraphStore,
    private backend: StorageBackend,
  ) {
    this.startTime = Date.now();
  }

  async check(): Promise<HealthStatus> {
    const connected = await this.store.healthCheck().catch((error: unknown) => {
      console.error('Storage health check failed:', error);
      return false;
    });
    const entities = connected
      ? (await this.store.getStatistics()).entities
      : 0;

    return {
      status: connected ? 'ok' : 'error',
      storage: connected ? 'connected' : 'disconnected',
      backend: this.backend,
      entities,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }
}
