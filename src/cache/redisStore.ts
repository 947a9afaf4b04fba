/**
 * Networked tier backed by Redis
 *
 * Values are stored as JSON envelopes ({ value, expiresAt }) with a native
 * TTL, so a hit can be copied into faster tiers with its remaining lifetime.
 */

import { Redis } from 'ioredis';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { isCacheEntry, isExpired, type CacheEntry, type CacheStore } from './cacheStore.js';

const COMPONENT = 'Redis';
const SCAN_BATCH = 100;

/**
 * The subset of the ioredis client this tier uses
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  mget(keys: string[]): Promise<(string | null)[]>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, matchToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
  quit(): Promise<unknown>;
}

export class RedisStore implements CacheStore {
  readonly name = 'redis';

  constructor(private readonly client: RedisClient) {}

  private decode(key: string, raw: string | null): CacheEntry | null {
    if (raw === null) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isCacheEntry(parsed) || isExpired(parsed)) return null;
      return parsed;
    } catch (err) {
      logger.warn(COMPONENT, `Discarding unreadable entry ${key}: ${errorMessage(err)}`);
      return null;
    }
  }

  async get(key: string): Promise<CacheEntry | null> {
    try {
      return this.decode(key, await this.client.get(key));
    } catch (err) {
      logger.warn(COMPONENT, `get ${key} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async set(key: string, entry: CacheEntry): Promise<boolean> {
    const ttlSeconds = Math.ceil((entry.expiresAt - Date.now()) / 1000);
    if (ttlSeconds <= 0) return false;

    try {
      await this.client.set(key, JSON.stringify(entry), 'EX', ttlSeconds);
      return true;
    } catch (err) {
      logger.warn(COMPONENT, `set ${key} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async getMany(keys: string[]): Promise<Map<string, CacheEntry>> {
    const found = new Map<string, CacheEntry>();
    if (keys.length === 0) return found;

    try {
      const values = await this.client.mget(keys);
      keys.forEach((key, index) => {
        const entry = this.decode(key, values[index] ?? null);
        if (entry) found.set(key, entry);
      });
    } catch (err) {
      logger.warn(COMPONENT, `mget of ${keys.length} keys failed: ${errorMessage(err)}`);
    }
    return found;
  }

  async delete(key: string): Promise<boolean> {
    try {
      return (await this.client.del(key)) > 0;
    } catch (err) {
      logger.warn(COMPONENT, `del ${key} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async deletePattern(pattern: string): Promise<number> {
    let deleted = 0;
    try {
      let cursor = '0';
      do {
        const [next, keys] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_BATCH);
        if (keys.length > 0) {
          deleted += await this.client.del(...keys);
        }
        cursor = next;
      } while (cursor !== '0');
    } catch (err) {
      logger.warn(COMPONENT, `scan-delete ${pattern} failed after ${deleted} keys: ${errorMessage(err)}`);
    }
    return deleted;
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      logger.warn(COMPONENT, `quit failed: ${errorMessage(err)}`);
    }
  }
}

/**
 * Connect to Redis with bounded command and connect timeouts so a stalled
 * backend turns into a miss instead of a hang.
 */
export function createRedisStore(url: string, timeoutMs: number): RedisStore {
  const client = new Redis(url, {
    connectTimeout: timeoutMs,
    commandTimeout: timeoutMs,
    maxRetriesPerRequest: 1,
  });
  client.on('error', (err: Error) => {
    logger.debug(COMPONENT, `connection error: ${err.message}`);
  });
  return new RedisStore(client);
}
