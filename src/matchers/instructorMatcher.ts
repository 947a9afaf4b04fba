/**
 * Instructor Matcher
 * Picks the upstream identity that best fits a schedule's instructor name
 */

export interface InstructorCandidate {
  firstName: string;
  lastName: string;
  numRatings: number;
}

export interface NameQuery {
  first: string;
  last: string;
}

export interface ScoredCandidate<T extends InstructorCandidate> {
  candidate: T;
  score: number;
}

/** Below this a match is treated as "not found". */
export const MATCH_THRESHOLD = 80;

const BASE_SCORE = 100;
const FIRST_NAME_EXACT = 50;
const FIRST_INITIAL = 25;
const FIRST_NAME_MISMATCH = -20;
const MAX_RATINGS_BONUS = 20;
const NO_RATINGS_PENALTY = -30;

/**
 * "Jane Q. Smith" → { first: "Jane", last: "Smith" }. Single-word names cannot be matched.
 */
export function splitName(name: string): NameQuery | null {
  const parts = name.trim().split(/\s+/).filter(Boolean);
  if (parts.length < 2) return null;
  return { first: parts[0], last: parts[parts.length - 1] };
}

/**
 * Score one candidate. Returns null when the last name differs,
 * which rules the candidate out entirely.
 */
export function scoreCandidate(candidate: InstructorCandidate, query: NameQuery): number | null {
  const candidateFirst = candidate.firstName.trim().toLowerCase();
  const candidateLast = candidate.lastName.trim().toLowerCase();
  const queryFirst = query.first.toLowerCase();

  if (candidateLast !== query.last.toLowerCase()) return null;

  let score = BASE_SCORE;

  if (candidateFirst === queryFirst) {
    score += FIRST_NAME_EXACT;
  } else if (queryFirst.length > 0 && candidateFirst.startsWith(queryFirst[0])) {
    score += FIRST_INITIAL;
  } else {
    score += FIRST_NAME_MISMATCH;
  }

  if (candidate.numRatings > 0) {
    score += Math.min(candidate.numRatings, MAX_RATINGS_BONUS);
  } else {
    score += NO_RATINGS_PENALTY;
  }

  return score;
}

/**
 * Highest-scoring candidate at or above the threshold. Earlier candidates win ties.
 */
export function selectBestCandidate<T extends InstructorCandidate>(
  candidates: readonly T[],
  query: NameQuery,
  threshold: number = MATCH_THRESHOLD,
): ScoredCandidate<T> | null {
  let best: ScoredCandidate<T> | null = null;

  for (const candidate of candidates) {
    const score = scoreCandidate(candidate, query);
    if (score === null) continue;
    if (!best || score > best.score) {
      best = { candidate, score };
    }
  }

  if (!best || best.score < threshold) return null;
  return best;
}
