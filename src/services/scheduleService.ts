/**
 * Available-course orchestration
 *
 * Per subject: volatile cache → durable store → live fetch (with retry).
 * A subject that cannot be fetched is logged and skipped; the rest of
 * the batch still returns.
 */

import pLimit from 'p-limit';
import { courseCacheKey } from '../cache/keys.js';
import type { TieredCache } from '../cache/tieredCache.js';
import type { CacheDatabase } from '../db/database.js';
import { errorMessage } from '../errors.js';
import { sleep as defaultSleep, withRetry, type RetryPolicy } from '../http/retry.js';
import { logger } from '../logger.js';
import { parseSchedule } from '../parsers/scheduleParser.js';
import type { ScheduleFetcher } from '../scrapers/scheduleFetcher.js';
import { courseListSchema } from '../schemas.js';
import type { CourseRecord } from '../types.js';

const COMPONENT = 'Schedule';

export interface ScheduleServiceOptions {
  fetcher: ScheduleFetcher;
  cache: TieredCache;
  db: CacheDatabase | null;
  ttlSeconds: number;
  retryPolicy: RetryPolicy;
  maxConcurrentRequests: number;
  subjectDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchCoursesOptions {
  openOnly?: boolean;
  useCache?: boolean;
  signal?: AbortSignal;
}

export interface CourseFetchResult {
  courses: CourseRecord[];
  failedSubjects: string[];
}

export interface CourseSearch {
  subject: string;
  courseNumber?: string;
  keyword?: string;
}

type CourseSource = 'memory/network' | 'durable' | 'live';

interface SubjectOutcome {
  subject: string;
  courses: CourseRecord[];
  failed: boolean;
}

export function hasOpenSeats(course: CourseRecord): boolean {
  return course.seatsAvailable !== null && course.seatsAvailable > 0;
}

export class ScheduleService {
  private readonly options: ScheduleServiceOptions;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: ScheduleServiceOptions) {
    this.options = options;
    this.wait = options.sleep ?? defaultSleep;
  }

  private async loadSubject(
    term: string,
    subject: string,
    useCache: boolean,
  ): Promise<{ courses: CourseRecord[]; source: CourseSource }> {
    const { cache, db, fetcher, ttlSeconds, retryPolicy, subjectDelayMs } = this.options;
    const key = courseCacheKey(term, subject);

    if (useCache) {
      const cached = await cache.get(key, courseListSchema);
      if (cached) return { courses: cached, source: 'memory/network' };

      const stored = db?.getCourses(term, subject) ?? null;
      if (stored) {
        await cache.set(key, stored, ttlSeconds);
        return { courses: stored, source: 'durable' };
      }
    }

    const started = Date.now();
    const documents = await withRetry(() => fetcher.fetchSubject(term, subject), retryPolicy, {
      label: `${subject} ${term}`,
      sleep: this.options.sleep,
    });
    const courses = documents.filter(doc => doc.step === 'search').flatMap(doc => parseSchedule(doc.body));

    if (courses.length > 0) {
      await cache.set(key, courses, ttlSeconds);
      db?.saveCourses(term, subject, courses, ttlSeconds);
    }
    db?.recordScrape({
      source: 'schedule',
      operation: 'get_courses',
      status: courses.length > 0 ? 'success' : 'not_found',
      term,
      subject,
      itemsFound: courses.length,
      durationMs: Date.now() - started,
    });

    // Courtesy pause before this slot takes the next subject
    if (subjectDelayMs > 0) await this.wait(subjectDelayMs);

    return { courses, source: 'live' };
  }

  async getAvailableCourses(
    term: string,
    subjects: readonly string[],
    options: FetchCoursesOptions = {},
  ): Promise<CourseFetchResult> {
    const { openOnly = true, useCache = true, signal } = options;
    const unique = [...new Set(subjects.map(s => s.trim().toUpperCase()).filter(Boolean))];
    const limit = pLimit(this.options.maxConcurrentRequests);
    const started = Date.now();

    const perSubject = await Promise.all(
      unique.map(subject =>
        limit(async (): Promise<SubjectOutcome> => {
          if (signal?.aborted) return { subject, courses: [], failed: false };
          try {
            const { courses, source } = await this.loadSubject(term, subject, useCache);
            logger.info(COMPONENT, `${subject.padEnd(5)} ${courses.length} sections (${source})`);
            return { subject, courses, failed: false };
          } catch (err) {
            logger.error(COMPONENT, `${subject} ${term} could not be fetched: ${errorMessage(err)}`);
            this.options.db?.recordScrape({
              source: 'schedule',
              operation: 'get_courses',
              status: 'error',
              term,
              subject,
              errorMessage: errorMessage(err),
            });
            return { subject, courses: [], failed: true };
          }
        }),
      ),
    );

    // Abandoned by the caller: anything fetched stays cached, the result is dropped
    signal?.throwIfAborted();

    const courses = perSubject.flatMap(result => result.courses).filter(course => !openOnly || hasOpenSeats(course));
    const failedSubjects = perSubject.filter(result => result.failed).map(result => result.subject);

    logger.info(
      COMPONENT,
      `${courses.length} courses across ${unique.length - failedSubjects.length}/${unique.length} subjects in ${Date.now() - started}ms`,
    );
    return { courses, failedSubjects };
  }

  /**
   * Open and closed sections of one subject, narrowed by course number and/or
   * a keyword matched against the title or the "SUBJNUM" code.
   */
  async searchCourses(term: string, search: CourseSearch, useCache = true): Promise<CourseRecord[]> {
    const { courses } = await this.getAvailableCourses(term, [search.subject], { openOnly: false, useCache });
    const keyword = search.keyword?.trim().toLowerCase();

    return courses.filter(course => {
      if (search.courseNumber && course.courseNumber !== search.courseNumber) return false;
      if (keyword) {
        const code = `${course.subject}${course.courseNumber}`.toLowerCase();
        return course.title.toLowerCase().includes(keyword) || code.includes(keyword);
      }
      return true;
    });
  }
}
