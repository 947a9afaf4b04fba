/**
 * Course Discovery
 * preferences → available courses → instructor ratings → match
 */

import { logger } from '../logger.js';
import { assertPreferences, matchCourses } from '../matchers/courseMatcher.js';
import type { RatingFetcher } from '../scrapers/ratingFetcher.js';
import type { CompletedCourse, MatchedCourse, PreferenceSet, RatingRecord } from '../types.js';
import type { ScheduleService } from './scheduleService.js';

const COMPONENT = 'Discovery';

export interface DiscoverOptions {
  includeRatings?: boolean;
  useCache?: boolean;
  signal?: AbortSignal;
}

export interface DiscoveryResult {
  matched: MatchedCourse[];
  totalCredits: number;
  poolSize: number;
  failedSubjects: string[];
}

export class CourseDiscovery {
  constructor(
    private readonly schedule: ScheduleService,
    private readonly ratings: RatingFetcher,
  ) {}

  async discover(
    term: string,
    preferences: PreferenceSet,
    completed: readonly CompletedCourse[] = [],
    options: DiscoverOptions = {},
  ): Promise<DiscoveryResult> {
    const { includeRatings = true, useCache = true, signal } = options;

    // Nothing can match an empty preference set; reject before any fetch
    assertPreferences(preferences);

    const subjects = preferences.preferences.map(preference => preference.subject);
    const { courses, failedSubjects } = await this.schedule.getAvailableCourses(term, subjects, {
      openOnly: !preferences.includeUnknownSeats,
      useCache,
      signal,
    });

    let ratings = new Map<string, RatingRecord | null>();
    if (includeRatings) {
      const instructors = courses.flatMap(course => (course.instructor ? [course.instructor] : []));
      ratings = await this.ratings.batchGetRatings(instructors);
      signal?.throwIfAborted();
    }

    const matched = matchCourses(preferences, courses, completed, ratings);
    const totalCredits = matched.reduce((sum, course) => sum + course.credits, 0);

    logger.info(
      COMPONENT,
      `${matched.length} of ${courses.length} courses matched (${totalCredits} credits)`,
      { term, subjects, failedSubjects },
    );

    return { matched, totalCredits, poolSize: courses.length, failedSubjects };
  }
}
