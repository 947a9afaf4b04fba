/**
 * Section Scout engine
 *
 * Wires config into the cache tiers, fetchers and services, and re-exports
 * the public API for library use.
 */

import type { CacheStore } from './cache/cacheStore.js';
import { MemoryStore } from './cache/memoryStore.js';
import { createRedisStore, type RedisStore } from './cache/redisStore.js';
import { TieredCache } from './cache/tieredCache.js';
import type { AppConfig } from './config.js';
import { CacheDatabase } from './db/database.js';
import { errorMessage } from './errors.js';
import { HttpClient, type FetchFn } from './http/client.js';
import type { RetryPolicy } from './http/retry.js';
import { logger, parseLogLevel } from './logger.js';
import { RatingFetcher } from './scrapers/ratingFetcher.js';
import { ScheduleFetcher } from './scrapers/scheduleFetcher.js';
import { CourseDiscovery } from './services/courseDiscovery.js';
import { ScheduleService } from './services/scheduleService.js';

export interface EngineOverrides {
  fetchFn?: FetchFn;
  network?: CacheStore | null;
  db?: CacheDatabase | null;
  sleep?: (ms: number) => Promise<void>;
}

export interface Engine {
  config: AppConfig;
  cache: TieredCache;
  db: CacheDatabase | null;
  schedule: ScheduleService;
  ratings: RatingFetcher;
  discovery: CourseDiscovery;
  close(): Promise<void>;
}

function openDatabase(path: string): CacheDatabase | null {
  try {
    const db = new CacheDatabase(path);
    db.initialize();
    return db;
  } catch (err) {
    logger.warn('Engine', `Durable store unavailable at ${path}: ${errorMessage(err)}`);
    return null;
  }
}

export function createEngine(config: AppConfig, overrides: EngineOverrides = {}): Engine {
  logger.setLevel(parseLogLevel(config.log.level));

  const http = new HttpClient({
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
    fetchFn: overrides.fetchFn,
  });

  let redis: RedisStore | null = null;
  let network: CacheStore | null;
  if (overrides.network !== undefined) {
    network = overrides.network;
  } else if (config.cache.redisUrl) {
    redis = createRedisStore(config.cache.redisUrl, config.http.timeoutMs);
    network = redis;
  } else {
    network = null;
  }

  const cache = new TieredCache(new MemoryStore(config.cache.memorySize), network);
  const db = overrides.db !== undefined ? overrides.db : openDatabase(config.cache.databasePath);

  const retryPolicy: RetryPolicy = {
    maxAttempts: config.http.maxRetries,
    baseDelayMs: config.http.retryDelayMs,
    maxDelayMs: config.http.retryMaxDelayMs,
  };

  const schedule = new ScheduleService({
    fetcher: new ScheduleFetcher(http, config.schedule),
    cache,
    db,
    ttlSeconds: config.cache.courseTtlSeconds,
    retryPolicy,
    maxConcurrentRequests: config.http.maxConcurrentRequests,
    subjectDelayMs: config.http.subjectDelayMs,
    sleep: overrides.sleep,
  });

  const ratings = new RatingFetcher({
    http,
    cache,
    db,
    source: config.ratings,
    ttlSeconds: config.cache.ratingTtlSeconds,
    retryPolicy,
    maxConcurrentRequests: config.http.maxConcurrentRequests,
    sleep: overrides.sleep,
  });

  return {
    config,
    cache,
    db,
    schedule,
    ratings,
    discovery: new CourseDiscovery(schedule, ratings),
    async close() {
      await redis?.close();
      db?.close();
      logger.flush();
    },
  };
}

export { loadConfig, type AppConfig } from './config.js';
export { MatchPreconditionError, TransientNetworkError, UpstreamError } from './errors.js';
export { matchCourses, hasConflict, scoreCourse } from './matchers/courseMatcher.js';
export { parseSchedule } from './parsers/scheduleParser.js';
export { preferenceSetSchema, completedCoursesSchema } from './schemas.js';
export type { DiscoveryResult } from './services/courseDiscovery.js';
export type * from './types.js';
