/**
 * In-process LRU tier with per-entry expiry
 */

import { globToRegExp, isExpired, type CacheEntry, type CacheStore } from './cacheStore.js';

export class MemoryStore implements CacheStore {
  readonly name = 'memory';
  private cache: Map<string, CacheEntry>;
  private maxSize: number;

  constructor(maxSize = 500) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  private read(key: string): CacheEntry | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (isExpired(entry)) {
      this.cache.delete(key);
      return null;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry;
  }

  async get(key: string): Promise<CacheEntry | null> {
    return this.read(key);
  }

  async set(key: string, entry: CacheEntry): Promise<boolean> {
    if (isExpired(entry)) return false;

    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    // At capacity: evict least recently used
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }

    this.cache.set(key, entry);
    return true;
  }

  async getMany(keys: string[]): Promise<Map<string, CacheEntry>> {
    const found = new Map<string, CacheEntry>();
    for (const key of keys) {
      const entry = this.read(key);
      if (entry) found.set(key, entry);
    }
    return found;
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async deletePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let deleted = 0;
    for (const key of [...this.cache.keys()]) {
      if (matcher.test(key)) {
        this.cache.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  size(): number {
    return this.cache.size;
  }
}
