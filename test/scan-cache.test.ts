import { describe, it, expect, vi } from 'vitest';
import { MemoryScanCache, scanCacheKey, timeBucket, withScanCache } from '../src/cache/scan-cache.js';

describe('MemoryScanCache', () => {
  it('evicts the least recently used entry past capacity', () => {
    const cache = new MemoryScanCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1); // a is now most recent
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(cache.size).toBe(2);
  });

  it('supports delete and clear', () => {
    const cache = new MemoryScanCache<string>(4);
    cache.set('x', 'one');
    cache.set('y', 'two');
    expect(cache.delete('x')).toBe(true);
    expect(cache.delete('x')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new MemoryScanCache(0)).toThrow(RangeError);
  });
});

describe('cache keys', () => {
  it('buckets time into fixed windows', () => {
    expect(timeBucket(0, 1000)).toBe(0);
    expect(timeBucket(999, 1000)).toBe(0);
    expect(timeBucket(1000, 1000)).toBe(1);
  });

  it('keys by asset, reference day and bucket', () => {
    expect(scanCacheKey('btc', '2026-03-02', 42)).toBe('scan:BTC:2026-03-02:42');
  });
});

describe('withScanCache', () => {
  it('runs the loader once per key', async () => {
    const cache = new MemoryScanCache<string>(4);
    const loader = vi.fn(async () => 'report');

    expect(await withScanCache(cache, 'k', loader)).toBe('report');
    expect(await withScanCache(cache, 'k', loader)).toBe('report');
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('does not cache a failed load', async () => {
    const cache = new MemoryScanCache<string>(4);
    await expect(withScanCache(cache, 'k', async () => Promise.reject(new Error('down')))).rejects.toThrow('down');
    expect(cache.size).toBe(0);
  });
});
