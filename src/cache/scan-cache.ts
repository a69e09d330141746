export interface ScanCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

/**
 * In-process LRU cache. Reads refresh recency; inserting past `maxEntries`
 * evicts the least recently used key.
 */
export class MemoryScanCache<T> implements ScanCache<T> {
  private store = new Map<string, T>();

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): T | undefined {
    const value = this.store.get(key);
    if (value === undefined) return undefined;
    this.store.delete(key);
    this.store.set(key, value);
    return value;
  }

  set(key: string, value: T): void {
    this.store.delete(key);
    this.store.set(key, value);
    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }
}

/** Index of the fixed-width time window `nowMs` falls in. */
export function timeBucket(nowMs: number, bucketMs: number): number {
  return Math.floor(nowMs / bucketMs);
}

/**
 * The reference day is part of the key: a bucket whose width does not divide
 * a day can straddle UTC midnight, and reports from either side differ.
 */
export function scanCacheKey(asset: string, referenceDay: string, bucket: number): string {
  return `scan:${asset.toUpperCase()}:${referenceDay}:${bucket}`;
}

/** Return the cached value for `key`, or run `loader` and cache its result. */
export async function withScanCache<T>(cache: ScanCache<T>, key: string, loader: () => Promise<T>): Promise<T> {
  const cached = cache.get(key);
  if (cached !== undefined) return cached;
  const value = await loader();
  cache.set(key, value);
  return value;
}
