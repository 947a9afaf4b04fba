/**
 * Cache key generators
 */

export function courseCacheKey(term: string, subject: string): string {
  return `courses:${term}:${subject.trim().toUpperCase()}`;
}

/**
 * "  Jane   SMITH " → "jane smith"
 */
export function normalizeInstructorName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function ratingCacheKey(schoolId: string, instructorName: string): string {
  return `instructor:${schoolId}:${normalizeInstructorName(instructorName).replace(/ /g, '_')}`;
}
