// LRU cache for exact entity lookups
import type { Entity } from '@graphweave/shared';

/**
 * Entities keyed by the id they were looked up with. An alias id and the
 * canonical id of the same entity are separate entries.
 *
 * A size of 0 disables the cache.
 */
export class EntityCache {
  // Map iteration order is insertion order, so the first key is the oldest
  private readonly entries = new Map<string, Entity>();

  constructor(readonly maxEntries: number) {}

  get enabled(): boolean {
    return this.maxEntries > 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get(id: string): Entity | undefined {
    const entity = this.entries.get(id);
    if (!entity) return undefined;
    this.entries.delete(id);
    this.entries.set(id, entity);
    return structuredClone(entity);
  }

  set(id: string, entity: Entity): void {
    if (!this.enabled) return;
    this.entries.delete(id);
    this.entries.set(id, structuredClone(entity));
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Drop every entry for the written entities, under any id they were
   * cached by or are now known by
   */
  invalidate(entities: Entity[]): void {
    if (entities.length === 0 || this.entries.size === 0) return;
    const ids = new Set<string>();
    for (const entity of entities) {
      ids.add(entity.canonical_id);
      for (const alias of entity.alias_ids) ids.add(alias);
    }
    for (const [key, cached] of [...this.entries]) {
      if (ids.has(key) || ids.has(cached.canonical_id)) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
