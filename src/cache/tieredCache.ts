/**
 * Read-through cache over the volatile tiers (in-process → networked)
 *
 * The durable store is not chained here; callers that need it consult it
 * explicitly after a miss. Nothing in this class throws to the caller.
 */

import type { z } from 'zod';
import { logger } from '../logger.js';
import type { CacheEntry, CacheStore } from './cacheStore.js';

const COMPONENT = 'Cache';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class TieredCache {
  constructor(
    private readonly memory: CacheStore,
    private readonly network: CacheStore | null = null,
  ) {}

  private decode<T>(key: string, entry: CacheEntry, schema: Schema<T>, tier: string): T | null {
    const result = schema.safeParse(entry.value);
    if (!result.success) {
      logger.warn(COMPONENT, `Ignoring malformed ${tier} entry ${key}`);
      return null;
    }
    return result.data;
  }

  async get<T>(key: string, schema: Schema<T>): Promise<T | null> {
    const local = await this.memory.get(key);
    if (local) {
      const value = this.decode(key, local, schema, this.memory.name);
      if (value !== null) {
        logger.debug(COMPONENT, `${this.memory.name} hit ${key}`);
        return value;
      }
    }

    if (!this.network) return null;

    const remote = await this.network.get(key);
    if (!remote) return null;

    const value = this.decode(key, remote, schema, this.network.name);
    if (value === null) return null;

    logger.debug(COMPONENT, `${this.network.name} hit ${key}`);
    await this.memory.set(key, remote);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    const entry: CacheEntry = { value, expiresAt: Date.now() + ttlSeconds * 1000 };
    const [stored, forwarded] = await Promise.all([
      this.memory.set(key, entry),
      this.network ? this.network.set(key, entry) : Promise.resolve(true),
    ]);
    return stored && forwarded;
  }

  async getMany<T>(keys: string[], schema: Schema<T>): Promise<Map<string, T>> {
    const found = new Map<string, T>();
    const local = await this.memory.getMany(keys);
    for (const [key, entry] of local) {
      const value = this.decode(key, entry, schema, this.memory.name);
      if (value !== null) found.set(key, value);
    }

    const missing = keys.filter(key => !found.has(key));
    if (!this.network || missing.length === 0) return found;

    const remote = await this.network.getMany(missing);
    for (const [key, entry] of remote) {
      const value = this.decode(key, entry, schema, this.network.name);
      if (value === null) continue;
      found.set(key, value);
      await this.memory.set(key, entry);
    }
    return found;
  }

  async delete(key: string): Promise<boolean> {
    const [local, remote] = await Promise.all([
      this.memory.delete(key),
      this.network ? this.network.delete(key) : Promise.resolve(false),
    ]);
    return local || remote;
  }

  /**
   * Delete every key matching a glob from both tiers. Returns the larger of
   * the two tiers' counts, since they hold the same logical keys.
   */
  async deletePattern(pattern: string): Promise<number> {
    const [local, remote] = await Promise.all([
      this.memory.deletePattern(pattern),
      this.network ? this.network.deletePattern(pattern) : Promise.resolve(0),
    ]);
    logger.info(COMPONENT, `Cleared ${pattern}`, { memory: local, network: remote });
    return Math.max(local, remote);
  }
}
