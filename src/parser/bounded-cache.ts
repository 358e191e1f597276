/**
 * @module parser/bounded-cache
 * @description Size-bounded memoization keyed by a content hash of the input text
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies crypto, src/constants.ts
 * @lastModified 2026-10-19
 */

import * as crypto from 'crypto';
import { CACHE_DEFAULTS } from '../constants';

// ============================================================================
// Bounded Cache
// ============================================================================

/**
 * Insert-if-absent cache with a fixed capacity. When full, the oldest
 * entries (a fixed share of capacity) are evicted before inserting.
 *
 * Instances are passed explicitly to the components that use them so the
 * lifetime of cached data is owned by the caller.
 *
 * @example
 * const cache = new BoundedCache<string>({ maxEntries: 500 });
 * const signature = cache.getOrCompute(sql, normalizeUncached);
 */
export class BoundedCache<V> {
  private entries: Map<string, { value: V }>;
  private maxEntries: number;
  private evictionRatio: number;
  private hitCount = 0;
  private missCount = 0;

  constructor(options: BoundedCacheOptions = {}) {
    this.entries = new Map();
    this.maxEntries = Math.max(1, options.maxEntries ?? CACHE_DEFAULTS.MAX_ENTRIES);
    this.evictionRatio = options.evictionRatio ?? CACHE_DEFAULTS.EVICTION_RATIO;
  }

  /**
   * SHA-256 of the text, used as the cache key
   */
  static keyFor(text: string): string {
    return crypto.createHash('sha256').update(text).digest('hex');
  }

  /**
   * Return the cached value for `text`, computing and storing it on a miss
   */
  getOrCompute(text: string, compute: (text: string) => V): V {
    const key = BoundedCache.keyFor(text);
    const hit = this.entries.get(key);
    if (hit) {
      this.hitCount++;
      return hit.value;
    }

    this.missCount++;
    const value = compute(text);
    if (this.entries.size >= this.maxEntries) {
      this.evictOldest();
    }
    this.entries.set(key, { value });
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  stats(): CacheStats {
    return { size: this.entries.size, hits: this.hitCount, misses: this.missCount };
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }

  // Map iteration order is insertion order, so the first keys are the oldest.
  private evictOldest(): void {
    const count = Math.max(1, Math.ceil(this.maxEntries * this.evictionRatio));
    const toRemove = Array.from(this.entries.keys()).slice(0, count);
    for (const key of toRemove) {
      this.entries.delete(key);
    }
  }
}

// ============================================================================
// Types
// ============================================================================

export interface BoundedCacheOptions {
  /** Capacity ceiling (default 1000) */
  maxEntries?: number;
  /** Share of capacity evicted when full (default 0.2) */
  evictionRatio?: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
}
