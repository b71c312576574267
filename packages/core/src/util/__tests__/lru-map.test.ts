import { describe, expect, it } from 'vitest';

import { LRUMap } from '../lru-map.js';

describe('LRUMap', () => {
  it('evicts the least recently used entry', () => {
    const map = new LRUMap<string, number>(2);
    map.set('a', 1);
    map.set('b', 2);
    expect(map.get('a')).toBe(1);
    map.set('c', 3);
    expect(map.has('b')).toBe(false);
    expect([...map.values()]).toEqual([1, 3]);
    expect(map.size).toBe(2);
  });

  it('refreshes an entry on overwrite', () => {
    const map = new LRUMap<string, number>(2);
    map.set('a', 1);
    map.set('b', 2);
    map.set('a', 10);
    map.set('c', 3);
    expect([...map.values()]).toEqual([10, 3]);
    map.clear();
    expect(map.size).toBe(0);
  });
});
