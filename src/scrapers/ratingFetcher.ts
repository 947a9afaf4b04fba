/**
 * Rating Fetcher
 *
 * Lookup order: memory → networked cache → durable store (unexpired rows
 * only) → live ratings API. Hits are copied forward into the faster tiers.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import type { TieredCache } from '../cache/tieredCache.js';
import { normalizeInstructorName, ratingCacheKey } from '../cache/keys.js';
import type { CacheDatabase } from '../db/database.js';
import { UpstreamError, errorMessage } from '../errors.js';
import type { HttpClient } from '../http/client.js';
import { withRetry, type RetryPolicy } from '../http/retry.js';
import { logger } from '../logger.js';
import { selectBestCandidate, splitName, type InstructorCandidate } from '../matchers/instructorMatcher.js';
import { ratingRecordSchema } from '../schemas.js';
import type { RatingRecord } from '../types.js';

const COMPONENT = 'Ratings';
const MAX_TOP_COURSES = 5;
const PLACEHOLDER_INSTRUCTORS = new Set(['staff', 'tba', 'tbd', 'to be announced']);

export const INSTRUCTOR_SEARCH_QUERY = `
query NewSearchTeachersQuery($query: TeacherSearchQuery!) {
  newSearch {
    teachers(query: $query) {
      edges {
        cursor
        node {
          id
          legacyId
          firstName
          lastName
          school { name id }
          department
          avgRating
          avgDifficulty
          wouldTakeAgainPercent
          numRatings
          courseCodes { courseName courseCount }
        }
      }
    }
  }
}`;

const teacherNodeSchema = z.object({
  id: z.string(),
  legacyId: z.union([z.number(), z.string()]).nullish(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  school: z.object({ name: z.string().nullish(), id: z.string().nullish() }).nullish(),
  department: z.string().nullish(),
  avgRating: z.number().nullish(),
  avgDifficulty: z.number().nullish(),
  wouldTakeAgainPercent: z.number().nullish(),
  numRatings: z.number().nullish(),
  courseCodes: z.array(z.object({ courseName: z.string(), courseCount: z.number().nullish() })).nullish(),
});

export type TeacherNode = z.infer<typeof teacherNodeSchema>;

const searchResponseSchema = z.object({
  data: z
    .object({
      newSearch: z
        .object({
          teachers: z.object({ edges: z.array(z.object({ node: teacherNodeSchema })) }).nullish(),
        })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).nullish(),
});

export interface RatingSourceConfig {
  apiUrl: string;
  profileBaseUrl: string;
  schoolId: string;
  authorization: string;
}

export interface RatingFetcherOptions {
  http: HttpClient;
  cache: TieredCache;
  db: CacheDatabase | null;
  source: RatingSourceConfig;
  ttlSeconds: number;
  retryPolicy: RetryPolicy;
  maxConcurrentRequests: number;
  sleep?: (ms: number) => Promise<void>;
}

interface NodeCandidate extends InstructorCandidate {
  node: TeacherNode;
}

export function isPlaceholderInstructor(name: string): boolean {
  const normalized = normalizeInstructorName(name);
  return normalized === '' || PLACEHOLDER_INSTRUCTORS.has(normalized);
}

function bounded(value: number | null | undefined, max: number): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return value >= 0 && value <= max ? value : null;
}

/**
 * Normalize an upstream identity into a rating record. Values the source
 * marks as missing (null, negative sentinels) stay null, never 0.
 */
export function toRatingRecord(
  node: TeacherNode,
  instructorName: string,
  schoolId: string,
  profileBaseUrl: string,
): RatingRecord {
  const topCourses = [...(node.courseCodes ?? [])]
    .sort((a, b) => (b.courseCount ?? 0) - (a.courseCount ?? 0))
    .slice(0, MAX_TOP_COURSES)
    .map(course => course.courseName);

  const legacyId = node.legacyId ?? null;

  return {
    instructorName,
    schoolId,
    avgRating: bounded(node.avgRating, 5),
    avgDifficulty: bounded(node.avgDifficulty, 5),
    wouldTakeAgainPercent: bounded(node.wouldTakeAgainPercent, 100),
    numRatings: Math.max(0, Math.trunc(node.numRatings ?? 0)),
    department: node.department ?? null,
    sourceId: legacyId !== null ? String(legacyId) : node.id,
    firstName: node.firstName ?? null,
    lastName: node.lastName ?? null,
    schoolName: node.school?.name ?? null,
    profileUrl: legacyId !== null ? `${profileBaseUrl}/professor/${legacyId}` : null,
    topCourses,
  };
}

export class RatingFetcher {
  private readonly options: RatingFetcherOptions;

  constructor(options: RatingFetcherOptions) {
    this.options = options;
  }

  /**
   * One live query against the ratings API, with best-match selection.
   * Returns null when nothing scores above the acceptance threshold.
   */
  async searchInstructor(instructorName: string): Promise<RatingRecord | null> {
    const query = splitName(instructorName);
    if (!query) {
      logger.warn(COMPONENT, `Cannot split "${instructorName}" into first and last name`);
      return null;
    }

    const { http, source } = this.options;
    const body = await http.postJson(
      source.apiUrl,
      {
        query: INSTRUCTOR_SEARCH_QUERY,
        variables: {
          query: { text: instructorName, schoolID: source.schoolId, fallback: true, departmentID: null },
        },
      },
      { Authorization: source.authorization },
    );

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`Unexpected ratings response shape for ${instructorName}`);
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      throw new UpstreamError(`Ratings query errors: ${parsed.data.errors.map(e => e.message).join('; ')}`);
    }

    const edges = parsed.data.data?.newSearch?.teachers?.edges ?? [];
    const candidates: NodeCandidate[] = edges.map(({ node }) => ({
      node,
      firstName: node.firstName ?? '',
      lastName: node.lastName ?? '',
      numRatings: node.numRatings ?? 0,
    }));

    const best = selectBestCandidate(candidates, query);
    if (!best) {
      logger.debug(COMPONENT, `No acceptable match among ${candidates.length} candidates for ${instructorName}`);
      return null;
    }

    return toRatingRecord(best.candidate.node, instructorName, source.schoolId, source.profileBaseUrl);
  }

  async getRating(instructorName: string): Promise<RatingRecord | null> {
    if (isPlaceholderInstructor(instructorName)) return null;

    const { cache, db, source, ttlSeconds } = this.options;
    const key = ratingCacheKey(source.schoolId, instructorName);

    const cached = await cache.get(key, ratingRecordSchema);
    if (cached) return cached;

    const stored = db?.getRating(instructorName, source.schoolId) ?? null;
    if (stored) {
      logger.debug(COMPONENT, `Durable hit for ${instructorName}`);
      await cache.set(key, stored, ttlSeconds);
      return stored;
    }

    return this.fetchLive(instructorName, key);
  }

  private async fetchLive(instructorName: string, key: string): Promise<RatingRecord | null> {
    const { cache, db, source, ttlSeconds, retryPolicy, sleep } = this.options;
    const started = Date.now();
    const query = { instructor: instructorName, school: source.schoolId };

    try {
      const rating = await withRetry(() => this.searchInstructor(instructorName), retryPolicy, {
        label: `rating ${instructorName}`,
        sleep,
      });
      const durationMs = Date.now() - started;

      if (!rating) {
        logger.info(COMPONENT, `No rating found for ${instructorName}`);
        db?.recordScrape({ source: 'ratings', operation: 'get_rating', status: 'not_found', query, durationMs });
        return null;
      }

      await cache.set(key, rating, ttlSeconds);
      db?.upsertRating(rating, ttlSeconds);
      logger.info(COMPONENT, `Found ${instructorName}: ${rating.avgRating ?? '?'}/5 (${rating.numRatings} ratings)`);
      db?.recordScrape({
        source: 'ratings',
        operation: 'get_rating',
        status: 'success',
        query,
        itemsFound: 1,
        durationMs,
      });
      return rating;
    } catch (err) {
      logger.error(COMPONENT, `Rating lookup failed for ${instructorName}: ${errorMessage(err)}`);
      db?.recordScrape({
        source: 'ratings',
        operation: 'get_rating',
        status: 'error',
        query,
        durationMs: Date.now() - started,
        errorMessage: errorMessage(err),
      });
      return null;
    }
  }

  /**
   * Ratings for many instructors. Cached names are answered from one
   * multi-key read; the rest are looked up individually.
   */
  async batchGetRatings(names: readonly string[]): Promise<Map<string, RatingRecord | null>> {
    const results = new Map<string, RatingRecord | null>();
    const unique = [...new Set(names.map(name => name.trim()).filter(name => name !== ''))];

    const rateable: string[] = [];
    for (const name of unique) {
      if (isPlaceholderInstructor(name)) results.set(name, null);
      else rateable.push(name);
    }

    const keys = rateable.map(name => ratingCacheKey(this.options.source.schoolId, name));
    const cached = await this.options.cache.getMany(keys, ratingRecordSchema);

    const toFetch: string[] = [];
    rateable.forEach((name, index) => {
      const hit = cached.get(keys[index]);
      if (hit) results.set(name, hit);
      else toFetch.push(name);
    });

    const limit = pLimit(this.options.maxConcurrentRequests);
    const fetched = await Promise.all(toFetch.map(name => limit(() => this.getRating(name))));
    toFetch.forEach((name, index) => results.set(name, fetched[index]));

    const found = [...results.values()].filter(rating => rating !== null).length;
    logger.info(COMPONENT, `Ratings: ${found}/${results.size} found (${rateable.length - toFetch.length} cached)`);
    return results;
  }
}
