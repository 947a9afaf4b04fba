/**
 * Course Matcher
 *
 * Pure matching over a read-only course pool:
 *   filter per preference → score → top 3 → merge/dedupe
 *   → resolve conflicts → credit cap → sort (priority asc, score desc)
 *
 * Inputs are never mutated; every MatchedCourse is a fresh object.
 */

import { MatchPreconditionError } from '../errors.js';
import type {
  CompletedCourse,
  ConflictMode,
  CourseRecord,
  MatchedCourse,
  Preference,
  PreferenceSet,
  RatingLookup,
  RatingRecord,
} from '../types.js';

export const MAX_CANDIDATES_PER_PREFERENCE = 3;

const BASE_SCORE = 50;
const COURSE_NUMBER_BONUS = 20;
const ONLINE_BONUS = 10;
const IN_PERSON_BONUS = 5;
const PREFERRED_DAY_BONUS = 15;
const MAX_SEATS_BONUS = 10;
const MAX_RATING_BONUS = 15;
const MAX_TAKE_AGAIN_BONUS = 5;
const MAX_DIFFICULTY_PENALTY = 3;

export function completedKey(subject: string, courseNumber: string): string {
  return `${subject.trim().toUpperCase()}${courseNumber.trim()}`;
}

function ratingFor(course: CourseRecord, ratings: RatingLookup): RatingRecord | null {
  if (!course.instructor) return null;
  return ratings.get(course.instructor.trim()) ?? null;
}

function hasSeats(course: CourseRecord, includeUnknownSeats: boolean): boolean {
  if (course.seatsAvailable === null) return includeUnknownSeats;
  return course.seatsAvailable > 0;
}

/**
 * Courses from the pool that one preference accepts, in pool order.
 */
export function filterCandidates(
  preference: Preference,
  pool: readonly CourseRecord[],
  completed: ReadonlySet<string>,
  options: { includeUnknownSeats?: boolean; ratings?: RatingLookup } = {},
): CourseRecord[] {
  const subject = preference.subject.toUpperCase();
  const excluded = (preference.excludeInstructors ?? []).map(name => name.toLowerCase());
  const ratings: RatingLookup = options.ratings ?? new Map<string, RatingRecord | null>();

  return pool.filter(course => {
    if (course.subject.toUpperCase() !== subject) return false;
    if (preference.courseNumber && course.courseNumber !== preference.courseNumber) return false;
    if (completed.has(completedKey(course.subject, course.courseNumber))) return false;
    if (preference.onlineOnly && course.deliveryMode !== 'online') return false;

    if (course.instructor && excluded.length > 0) {
      const instructor = course.instructor.toLowerCase();
      if (excluded.some(name => instructor.includes(name))) return false;
    }

    if (!hasSeats(course, options.includeUnknownSeats ?? false)) return false;

    // Unknown ratings pass
    if (preference.minRating !== undefined) {
      const avg = ratingFor(course, ratings)?.avgRating ?? null;
      if (avg !== null && avg < preference.minRating) return false;
    }

    return true;
  });
}

export function scoreCourse(
  course: CourseRecord,
  preference: Preference,
  preferOnline: boolean,
  rating: RatingRecord | null,
): number {
  let score = BASE_SCORE;

  if (preference.courseNumber && course.courseNumber === preference.courseNumber) {
    score += COURSE_NUMBER_BONUS;
  }

  if (preferOnline && course.deliveryMode === 'online') {
    score += ONLINE_BONUS;
  } else if (!preferOnline && course.deliveryMode === 'in-person') {
    score += IN_PERSON_BONUS;
  }

  const windows = preference.preferredTimes ?? [];
  if (windows.some(window => window.days.some(day => course.days.includes(day)))) {
    score += PREFERRED_DAY_BONUS;
  }

  if (course.seatsAvailable !== null && course.seatsTotal !== null && course.seatsTotal > 0) {
    score += MAX_SEATS_BONUS * Math.min(course.seatsAvailable / course.seatsTotal, 1);
  }

  if (rating) {
    if (rating.avgRating !== null) score += MAX_RATING_BONUS * (rating.avgRating / 5);
    if (rating.wouldTakeAgainPercent !== null) {
      score += MAX_TAKE_AGAIN_BONUS * (rating.wouldTakeAgainPercent / 100);
    }
    if (rating.avgDifficulty !== null) score -= MAX_DIFFICULTY_PENALTY * (rating.avgDifficulty / 5);
  }

  const clamped = Math.min(100, Math.max(0, score));
  return Math.round(clamped * 10) / 10;
}

function toMinutes(clock: string): number {
  const [hours, minutes] = clock.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Two courses conflict when neither is online and they share a meeting day.
 * In 'time' mode the meeting times must also overlap, when both are known.
 */
export function hasConflict(a: CourseRecord, b: CourseRecord, mode: ConflictMode = 'day'): boolean {
  if (a.deliveryMode === 'online' || b.deliveryMode === 'online') return false;
  if (!a.days.some(day => b.days.includes(day))) return false;
  if (mode === 'day' || !a.time || !b.time) return true;

  return toMinutes(a.time.start) < toMinutes(b.time.end) && toMinutes(b.time.start) < toMinutes(a.time.end);
}

function outranks(challenger: MatchedCourse, incumbent: MatchedCourse): boolean {
  if (challenger.priority !== incumbent.priority) return challenger.priority < incumbent.priority;
  return challenger.matchScore > incumbent.matchScore;
}

/**
 * Greedy pass in list order. A candidate that conflicts with accepted
 * courses replaces them only if it outranks every one of them.
 */
export function resolveConflicts(courses: readonly MatchedCourse[], mode: ConflictMode = 'day'): MatchedCourse[] {
  let accepted: MatchedCourse[] = [];

  for (const candidate of courses) {
    const conflicting = accepted.filter(course => hasConflict(course, candidate, mode));
    if (conflicting.length === 0) {
      accepted.push(candidate);
    } else if (conflicting.every(course => outranks(candidate, course))) {
      accepted = accepted.filter(course => !conflicting.includes(course));
      accepted.push(candidate);
    }
  }

  return accepted;
}

/**
 * First-fit credit cap: a course that would exceed it is skipped and the
 * walk goes on. Admitted courses are never swapped out.
 */
export function limitCredits(courses: readonly MatchedCourse[], maxCredits: number): MatchedCourse[] {
  const result: MatchedCourse[] = [];
  let total = 0;

  for (const course of courses) {
    if (total + course.credits > maxCredits) continue;
    total += course.credits;
    result.push(course);
  }

  return result;
}

export function assertPreferences(set: PreferenceSet): void {
  if (set.preferences.length === 0) {
    throw new MatchPreconditionError('At least one preference is required');
  }
}

export function matchCourses(
  set: PreferenceSet,
  pool: readonly CourseRecord[],
  completed: readonly CompletedCourse[] = [],
  ratings: RatingLookup = new Map<string, RatingRecord | null>(),
): MatchedCourse[] {
  assertPreferences(set);

  const exclusions = new Set(completed.map(course => completedKey(course.subject, course.courseNumber)));

  const merged: MatchedCourse[] = [];
  const seen = new Set<string>();

  for (const preference of set.preferences) {
    const candidates = filterCandidates(preference, pool, exclusions, {
      includeUnknownSeats: set.includeUnknownSeats,
      ratings,
    });

    // Array#sort is stable, so equal scores keep pool order
    const top = candidates
      .map((course): MatchedCourse => {
        const rating = ratingFor(course, ratings);
        return {
          ...course,
          days: [...course.days],
          time: course.time ? { ...course.time } : null,
          matchScore: scoreCourse(course, preference, set.preferOnline, rating),
          priority: preference.priority,
          rating,
        };
      })
      .sort((a, b) => b.matchScore - a.matchScore)
      .slice(0, MAX_CANDIDATES_PER_PREFERENCE);

    for (const course of top) {
      if (seen.has(course.registrationNumber)) continue;
      seen.add(course.registrationNumber);
      merged.push(course);
    }
  }

  let result = set.avoidTimeConflicts ? resolveConflicts(merged, set.conflictMode) : merged;
  if (set.maxCredits !== undefined) result = limitCredits(result, set.maxCredits);

  return [...result].sort((a, b) => a.priority - b.priority || b.matchScore - a.matchScore);
}
