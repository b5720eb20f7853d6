import { describe, expect, it } from 'vitest';
import { makeEntity } from '../test-helpers.js';
import { EntityCache } from './entity-cache.js';

describe('EntityCache', () => {
  it('should evict the least recently used entry', () => {
    const cache = new EntityCache(2);
    cache.set('a', makeEntity({ canonical_id: 'a' }));
    cache.set('b', makeEntity({ canonical_id: 'b' }));

    cache.get('a');
    cache.set('c', makeEntity({ canonical_id: 'c' }));

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')?.canonical_id).toBe('a');
    expect(cache.get('c')?.canonical_id).toBe('c');
    expect(cache.size).toBe(2);
  });

  it('should hand out copies', () => {
    const cache = new EntityCache(1);
    cache.set('a', makeEntity({ canonical_id: 'a' }));

    const copy = cache.get('a');
    copy?.source_chunk_ids.push('chunk-9');

    expect(cache.get('a')?.source_chunk_ids).toEqual(['chunk-0']);
  });

  it('should drop entries cached under an alias of a written entity', () => {
    const cache = new EntityCache(10);
    cache.set('alias-1', makeEntity({ canonical_id: 'a' }));
    cache.set('b', makeEntity({ canonical_id: 'b' }));

    cache.invalidate([makeEntity({ canonical_id: 'a' })]);

    expect(cache.get('alias-1')).toBeUndefined();
    expect(cache.get('b')?.canonical_id).toBe('b');
  });

  it('should store nothing when disabled', () => {
    const cache = new EntityCache(0);
    cache.set('a', makeEntity({ canonical_id: 'a' }));

    expect(cache.enabled).toBe(false);
    expect(cache.get('a')).toBeUndefined();
  });
});
