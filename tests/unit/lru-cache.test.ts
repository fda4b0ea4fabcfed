import { describe, it, expect, vi, afterEach } from 'vitest';
import { LRUCache } from '../../src/utils/lru-cache.js';

describe('LRUCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should store and retrieve values', () => {
    const cache = new LRUCache<string>({ maxSize: 10 });
    cache.set('key1', 'value1');
    expect(cache.get('key1')).toBe('value1');
  });

  it('should return undefined for missing keys', () => {
    const cache = new LRUCache<string>({ maxSize: 10 });
    expect(cache.get('missing')).toBeUndefined();
  });

  it('should enforce maxSize with LRU eviction', () => {
    const cache = new LRUCache<string>({ maxSize: 3 });
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');

    // Access 'a' to make it most recently used
    cache.get('a'); // Order: b, c, a

    // Add 'd', should evict 'b' (LRU)
    cache.set('d', '4'); // Order: c, a, d

    expect(cache.has('b')).toBe(false);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('c')).toBe(true);
    expect(cache.has('d')).toBe(true);
  });

  it('should respect TTL', () => {
    vi.useFakeTimers();
    const cache = new LRUCache<string>({ maxSize: 10, ttlMs: 1000 });

    cache.set('key', 'value');
    expect(cache.get('key')).toBe('value');

    vi.advanceTimersByTime(1100);

    expect(cache.get('key')).toBeUndefined();
    expect(cache.has('key')).toBe(false);
  });

  it('should store nothing when maxSize is 0', () => {
    const cache = new LRUCache<number[]>({ maxSize: 0 });
    cache.set('query', [1, 2, 3]);
    expect(cache.size).toBe(0);
  });

  it('should handle updating existing keys', () => {
    const cache = new LRUCache<string>({ maxSize: 3 });
    cache.set('a', 'value1');
    cache.set('b', 'value2');
    cache.set('a', 'value1-updated');

    expect(cache.get('a')).toBe('value1-updated');
    expect(cache.size).toBe(2);
  });

  it('should expose keys in LRU order', () => {
    const cache = new LRUCache<string>({ maxSize: 10 });
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');
    cache.get('a');

    expect(Array.from(cache.keys())).toEqual(['b', 'c', 'a']);
  });

  it('should delete and clear', () => {
    const cache = new LRUCache<string>({ maxSize: 10 });
    cache.set('a', '1');
    cache.set('b', '2');

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
