/**
 * LRU cache for memoising asynchronous lookups
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry } from './types.js';

/**
 * Cache manager used by the DNS prober.
 *
 * Pending lookups are shared: two workers asking for the same key while the
 * first lookup is still running await the same promise.
 */
export class CacheManager<T = unknown> {
  private cache: LRUCache<string, CacheEntry<T>>;
  private pending = new Map<string, Promise<T>>();
  private defaultTTL: number;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   */
  constructor(maxSize = 1000, ttl = 300000) {
    this.defaultTTL = ttl;
    this.cache = new LRUCache<string, CacheEntry<T>>({
      max: maxSize,
      ttl,
      updateAgeOnGet: true,
    });
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttl?: number): void {
    this.cache.set(key, { value, expiresAt: Date.now() + (ttl ?? this.defaultTTL) });
  }

  clear(): void {
    this.cache.clear();
    this.pending.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Get from cache, or compute once and cache. A rejected factory is not cached.
   */
  async getOrSet(key: string, factory: () => Promise<T>, ttl?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const lookup = factory()
      .then((value) => {
        this.set(key, value, ttl);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, lookup);
    return lookup;
  }
}
