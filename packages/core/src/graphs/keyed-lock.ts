/**
 * Async mutual exclusion over sets of string keys.
 *
 * All keys of one call are claimed synchronously, before any waiting, so two
 * calls can never each hold part of the other's key set.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withKeys<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = unique.map((key) => this.tails.get(key));
    for (const key of unique) {
      this.tails.set(key, held);
    }

    try {
      await Promise.all(previous);
      return await fn();
    } finally {
      release();
      for (const key of unique) {
        if (this.tails.get(key) === held) {
          this.tails.delete(key);
        }
      }
    }
  }

  /** Number of keys currently held or awaited */
  get size(): number {
    return this.tails.size;
  }
}
