/**
 * Section Scout Type Definitions
 */

// ============ Schedule Types ============

export const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type DeliveryMode = 'in-person' | 'online' | 'hybrid';

export interface TimeRange {
  start: string;        // "09:30" (24h)
  end: string;          // "10:45"
}

export interface CourseRecord {
  registrationNumber: string;   // CRN, unique per term
  subject: string;              // "CSC"
  courseNumber: string;         // "1301"
  section: string;              // "001"
  title: string;
  credits: number;
  instructor: string | null;
  days: Weekday[];
  time: TimeRange | null;
  location: string | null;
  deliveryMode: DeliveryMode;
  seatsAvailable: number | null;  // null = not published by the source
  seatsTotal: number | null;
}

export type RawDocumentStep = 'term' | 'search';

export interface RawDocument {
  step: RawDocumentStep;
  url: string;
  status: number;
  body: string;
}

// ============ Rating Types ============

export interface RatingRecord {
  instructorName: string;
  schoolId: string;
  avgRating: number | null;            // 0-5
  avgDifficulty: number | null;        // 0-5
  wouldTakeAgainPercent: number | null; // 0-100
  numRatings: number;
  department: string | null;
  sourceId: string | null;
  firstName: string | null;
  lastName: string | null;
  schoolName: string | null;
  profileUrl: string | null;
  topCourses: string[];                // most frequent first, max 5
}

// ============ Preference Types ============

export interface TimeWindow {
  days: Weekday[];
  start?: string;
  end?: string;
}

export interface Preference {
  subject: string;
  courseNumber?: string;
  priority: number;                    // 1 = highest
  onlineOnly?: boolean;
  excludeInstructors?: string[];
  preferredTimes?: TimeWindow[];
  minRating?: number;
}

export type ConflictMode = 'day' | 'time';

export interface PreferenceSet {
  preferences: Preference[];
  maxCredits?: number;
  avoidTimeConflicts: boolean;
  preferOnline: boolean;
  includeUnknownSeats?: boolean;
  conflictMode?: ConflictMode;
}

export interface CompletedCourse {
  subject: string;
  courseNumber: string;
}

// ============ Matching Types ============

export interface MatchedCourse extends CourseRecord {
  matchScore: number;                  // 0-100, one decimal
  priority: number;
  rating: RatingRecord | null;
}

export type RatingLookup = ReadonlyMap<string, RatingRecord | null>;

// ============ Scrape Log Types ============

export type ScrapeSource = 'schedule' | 'ratings';

export type ScrapeStatus = 'success' | 'not_found' | 'error';

export interface ScrapeLogEntry {
  source: ScrapeSource;
  operation: string;
  status: ScrapeStatus;
  term?: string;
  subject?: string;
  query?: Record<string, unknown>;
  itemsFound?: number;
  durationMs?: number;
  errorMessage?: string;
}
