import type { CacheEntry, CacheStore } from '../cache/cacheStore.js';
import { globToRegExp, isExpired } from '../cache/cacheStore.js';
import type { CourseRecord, MatchedCourse, RatingRecord } from '../types.js';

export function makeCourse(overrides: Partial<CourseRecord> = {}): CourseRecord {
  return {
    registrationNumber: '10001',
    subject: 'CSC',
    courseNumber: '1301',
    section: '001',
    title: 'Principles of Computer Science I',
    credits: 3,
    instructor: 'Jane Smith',
    days: ['Mon', 'Wed'],
    time: { start: '09:30', end: '10:45' },
    location: 'Classroom South 101',
    deliveryMode: 'in-person',
    seatsAvailable: 10,
    seatsTotal: 40,
    ...overrides,
  };
}

export function makeMatched(overrides: Partial<MatchedCourse> = {}): MatchedCourse {
  return {
    ...makeCourse(),
    matchScore: 50,
    priority: 1,
    rating: null,
    ...overrides,
  };
}

export function makeRating(overrides: Partial<RatingRecord> = {}): RatingRecord {
  return {
    instructorName: 'Jane Smith',
    schoolId: 'test-school',
    avgRating: 4,
    avgDifficulty: 2.5,
    wouldTakeAgainPercent: 80,
    numRatings: 12,
    department: 'Computer Science',
    sourceId: '101',
    firstName: 'Jane',
    lastName: 'Smith',
    schoolName: 'Test University',
    profileUrl: 'https://ratings.test/professor/101',
    topCourses: ['CSC1301'],
    ...overrides,
  };
}

export interface SectionFixture {
  title: string;
  crn: string;
  subject: string;
  number: string;
  section?: string;
  credits?: number;
  seats?: string;
  time?: string;
  days?: string;
  where?: string;
  instructor?: string;
}

const DETAIL_LABELS = ['Type', 'Time', 'Days', 'Where', 'Date Range', 'Schedule Type', 'Instructors'];

export function sectionBlocks(s: SectionFixture): string {
  const seatsRow = s.seats
    ? `<tr><td><a href="/bprod/bwckschd.p_disp_detail_sched?crn_in=${s.crn}">${s.seats}</a></td></tr>`
    : '';
  const meeting = [
    'Class',
    s.time ?? '9:30 am - 10:45 am',
    s.days ?? 'MW',
    s.where ?? 'Classroom South 101',
    'Aug 25, 2025 - Dec 08, 2025',
    'Lecture',
    s.instructor ?? 'Jane Smith',
  ];
  return [
    '<table class="datadisplaytable">',
    `<caption class="captiontext">${s.title} - ${s.crn} - ${s.subject} ${s.number} - ${s.section ?? '001'}</caption>`,
    `<tr><td>${s.credits ?? 3} Credits</td></tr>`,
    seatsRow,
    '</table>',
    '<table class="datadisplaytable">',
    `<tr>${DETAIL_LABELS.map(label => `<th>${label}</th>`).join('')}</tr>`,
    `<tr>${meeting.map(cell => `<td>${cell}</td>`).join('')}</tr>`,
    '</table>',
  ].join('\n');
}

export function scheduleHtml(sections: SectionFixture[]): string {
  return `<html><body>\n${sections.map(sectionBlocks).join('\n')}\n</body></html>`;
}

/**
 * In-process stand-in for the networked tier
 */
export class FakeStore implements CacheStore {
  readonly name = 'fake-network';
  readonly entries = new Map<string, CacheEntry>();
  available = true;

  async get(key: string): Promise<CacheEntry | null> {
    if (!this.available) return null;
    const entry = this.entries.get(key);
    return entry && !isExpired(entry) ? entry : null;
  }

  async set(key: string, entry: CacheEntry): Promise<boolean> {
    if (!this.available) return false;
    this.entries.set(key, entry);
    return true;
  }

  async getMany(keys: string[]): Promise<Map<string, CacheEntry>> {
    const found = new Map<string, CacheEntry>();
    for (const key of keys) {
      const entry = await this.get(key);
      if (entry) found.set(key, entry);
    }
    return found;
  }

  async delete(key: string): Promise<boolean> {
    return this.available && this.entries.delete(key);
  }

  async deletePattern(pattern: string): Promise<number> {
    if (!this.available) return 0;
    const matcher = globToRegExp(pattern);
    let deleted = 0;
    for (const key of [...this.entries.keys()]) {
      if (matcher.test(key)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}
