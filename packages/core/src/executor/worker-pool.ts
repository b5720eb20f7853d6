/**
 * Bounded pool of async workers pulling items from a shared cursor.
 * Results land at their item's index, so output order is input order
 * whatever the completion order.
 */
import { WorkerPoolClosedError } from './errors.js';

export class WorkerPool {
  private closed = false;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Run fn with a pool that is closed when fn settles
   */
  static async scoped<T>(
    size: number,
    fn: (pool: WorkerPool) => Promise<T>,
  ): Promise<T> {
    const pool = new WorkerPool(size);
    try {
      return await fn(pool);
    } finally {
      pool.close();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run task over items with at most `size` in flight. After the first
   * rejection no new items start; the first error is rethrown once running
   * tasks settle.
   */
  async map<I, O>(
    items: readonly I[],
    task: (item: I, index: number) => Promise<O>,
  ): Promise<O[]> {
    if (this.closed) {
      throw new WorkerPoolClosedError();
    }

    const results = new Array<O>(items.length);
    let cursor = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && !this.closed && cursor < items.length) {
        const index = cursor++;
        try {
          results[index] = await task(items[index], index);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const workers = Array.from(
      { length: Math.min(this.size, items.length) },
      worker,
    );
    const settled = await Promise.allSettled(workers);
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }
    return results;
  }

  close(): void {
    this.closed = true;
  }
}
