import { describe, expect, it } from 'vitest';

import { makeCourse, makeMatched, makeRating } from '../../__tests__/fixtures.js';
import { MatchPreconditionError } from '../../errors.js';
import type { CourseRecord, Preference, PreferenceSet } from '../../types.js';
import {
  completedKey,
  filterCandidates,
  hasConflict,
  limitCredits,
  matchCourses,
  resolveConflicts,
  scoreCourse,
} from '../courseMatcher.js';

function preferenceSet(preferences: Preference[], overrides: Partial<PreferenceSet> = {}): PreferenceSet {
  return { preferences, avoidTimeConflicts: true, preferOnline: false, ...overrides };
}

describe('completedKey', () => {
  it('joins subject and number', () => {
    expect(completedKey(' csc', '1301 ')).toBe('CSC1301');
  });
});

describe('filterCandidates', () => {
  const csc: Preference = { subject: 'CSC', priority: 1 };

  it('requires an open seat unless unknown seats are admitted', () => {
    const pool = [
      makeCourse({ registrationNumber: 'open' }),
      makeCourse({ registrationNumber: 'full', seatsAvailable: 0 }),
      makeCourse({ registrationNumber: 'unknown', seatsAvailable: null, seatsTotal: null }),
    ];
    expect(filterCandidates(csc, pool, new Set()).map(c => c.registrationNumber)).toEqual(['open']);
    expect(
      filterCandidates(csc, pool, new Set(), { includeUnknownSeats: true }).map(c => c.registrationNumber),
    ).toEqual(['open', 'unknown']);
  });

  it('applies subject, course number and completed courses', () => {
    const pool = [
      makeCourse({ registrationNumber: '1', courseNumber: '1301' }),
      makeCourse({ registrationNumber: '2', courseNumber: '2720' }),
      makeCourse({ registrationNumber: '3', subject: 'MATH', courseNumber: '1301' }),
    ];
    expect(filterCandidates({ ...csc, courseNumber: '2720' }, pool, new Set()).map(c => c.registrationNumber)).toEqual([
      '2',
    ]);
    expect(filterCandidates(csc, pool, new Set(['CSC1301'])).map(c => c.registrationNumber)).toEqual(['2']);
  });

  it('honours online-only and excluded instructor substrings', () => {
    const pool = [
      makeCourse({ registrationNumber: '1', instructor: 'Jane Smith' }),
      makeCourse({ registrationNumber: '2', instructor: 'Alan Turing', deliveryMode: 'online' }),
      makeCourse({ registrationNumber: '3', instructor: null, deliveryMode: 'online' }),
    ];
    expect(filterCandidates({ ...csc, onlineOnly: true }, pool, new Set()).map(c => c.registrationNumber)).toEqual([
      '2',
      '3',
    ]);
    expect(
      filterCandidates({ ...csc, excludeInstructors: ['SMITH'] }, pool, new Set()).map(c => c.registrationNumber),
    ).toEqual(['2', '3']);
  });

  it('filters on a known rating below the minimum and lets unknown ratings pass', () => {
    const pool = [
      makeCourse({ registrationNumber: '1', instructor: 'Jane Smith' }),
      makeCourse({ registrationNumber: '2', instructor: 'Alan Turing' }),
      makeCourse({ registrationNumber: '3', instructor: 'Ada Lovelace' }),
    ];
    const ratings = new Map([
      ['Jane Smith', makeRating({ avgRating: 2.5 })],
      ['Alan Turing', makeRating({ instructorName: 'Alan Turing', avgRating: 4.5 })],
    ]);
    expect(
      filterCandidates({ ...csc, minRating: 3 }, pool, new Set(), { ratings }).map(c => c.registrationNumber),
    ).toEqual(['2', '3']);
  });
});

describe('scoreCourse', () => {
  const preference: Preference = { subject: 'CSC', priority: 1, preferredTimes: [{ days: ['Wed'] }] };

  it('adds every component', () => {
    // 50 + 5 in-person + 15 day + 2.5 seats + 12 rating + 4 take-again - 1.5 difficulty
    expect(scoreCourse(makeCourse(), preference, false, makeRating())).toBe(87);
  });

  it('clamps to 100', () => {
    expect(scoreCourse(makeCourse(), { ...preference, courseNumber: '1301' }, false, makeRating())).toBe(100);
  });

  it('rewards online sections when online is preferred', () => {
    const course = makeCourse({ deliveryMode: 'online' });
    expect(scoreCourse(course, { subject: 'CSC', priority: 1 }, true, null)).toBe(62.5);
  });

  it('gives no delivery or seat bonus to hybrid sections with unknown seats', () => {
    const course = makeCourse({ deliveryMode: 'hybrid', seatsAvailable: null, seatsTotal: null });
    expect(scoreCourse(course, { subject: 'CSC', priority: 1 }, false, null)).toBe(50);
  });

  it('skips unknown rating fields rather than treating them as zero', () => {
    const rating = makeRating({ avgRating: null, wouldTakeAgainPercent: null, avgDifficulty: null });
    const course = makeCourse({ seatsTotal: null });
    expect(scoreCourse(course, { subject: 'CSC', priority: 1 }, false, rating)).toBe(55);
  });
});

describe('hasConflict', () => {
  const morning = makeCourse({ registrationNumber: 'a', days: ['Mon', 'Wed'], time: { start: '09:30', end: '10:45' } });
  const midday = makeCourse({ registrationNumber: 'b', days: ['Wed', 'Fri'], time: { start: '11:00', end: '12:15' } });
  const overlap = makeCourse({ registrationNumber: 'c', days: ['Mon'], time: { start: '10:00', end: '11:15' } });

  it('flags a shared day regardless of time in day mode', () => {
    expect(hasConflict(morning, midday)).toBe(true);
    expect(hasConflict(morning, makeCourse({ days: ['Tue', 'Thu'] }))).toBe(false);
  });

  it('never flags an online course', () => {
    expect(hasConflict(morning, { ...midday, deliveryMode: 'online' })).toBe(false);
  });

  it('compares time ranges in time mode', () => {
    expect(hasConflict(morning, midday, 'time')).toBe(false);
    expect(hasConflict(morning, overlap, 'time')).toBe(true);
    expect(hasConflict(morning, { ...midday, time: null }, 'time')).toBe(true);
  });
});

describe('resolveConflicts', () => {
  it('keeps the higher-priority course despite a lower score', () => {
    const p1 = makeMatched({ registrationNumber: 'p1', priority: 1, matchScore: 80 });
    const p2 = makeMatched({ registrationNumber: 'p2', priority: 2, matchScore: 95 });

    expect(resolveConflicts([p2, p1]).map(c => c.registrationNumber)).toEqual(['p1']);
    expect(resolveConflicts([p1, p2]).map(c => c.registrationNumber)).toEqual(['p1']);
  });

  it('breaks equal priority by score', () => {
    const low = makeMatched({ registrationNumber: 'low', matchScore: 60 });
    const high = makeMatched({ registrationNumber: 'high', matchScore: 70 });
    expect(resolveConflicts([low, high]).map(c => c.registrationNumber)).toEqual(['high']);
  });

  it('only replaces when the newcomer outranks every conflicting course', () => {
    const mon = makeMatched({ registrationNumber: 'mon', days: ['Mon'], priority: 1 });
    const wed = makeMatched({ registrationNumber: 'wed', days: ['Wed'], priority: 3 });
    const both = makeMatched({ registrationNumber: 'both', days: ['Mon', 'Wed'], priority: 2 });
    expect(resolveConflicts([mon, wed, both]).map(c => c.registrationNumber)).toEqual(['mon', 'wed']);
  });
});

describe('limitCredits', () => {
  const courses = [
    makeMatched({ registrationNumber: 'a', credits: 4 }),
    makeMatched({ registrationNumber: 'b', credits: 3 }),
    makeMatched({ registrationNumber: 'c', credits: 4 }),
    makeMatched({ registrationNumber: 'd', credits: 1 }),
  ];

  it('skips courses that would exceed the cap', () => {
    expect(limitCredits(courses, 7).map(c => c.registrationNumber)).toEqual(['a', 'b']);
  });

  it('admits a later course that still fits', () => {
    expect(limitCredits(courses, 8).map(c => c.registrationNumber)).toEqual(['a', 'b', 'd']);
  });
});

describe('matchCourses', () => {
  it('rejects an empty preference set', () => {
    expect(() => matchCourses(preferenceSet([]), [makeCourse()])).toThrow(MatchPreconditionError);
  });

  it('keeps the three open sections out of five, best first', () => {
    const seats = [0, 3, 10, 1, 0];
    const pool = seats.map((available, index) =>
      makeCourse({ registrationNumber: `CRN${index}`, seatsAvailable: available, seatsTotal: 10 }),
    );

    const result = matchCourses(preferenceSet([{ subject: 'CSC', priority: 1 }], { avoidTimeConflicts: false }), pool);

    expect(result.map(c => c.registrationNumber)).toEqual(['CRN2', 'CRN1', 'CRN3']);
    expect(result.map(c => c.matchScore)).toEqual([65, 58, 56]);
  });

  it('caps each preference at three candidates', () => {
    const pool = Array.from({ length: 5 }, (_, index) => makeCourse({ registrationNumber: `CRN${index}` }));
    const result = matchCourses(preferenceSet([{ subject: 'CSC', priority: 1 }], { avoidTimeConflicts: false }), pool);
    expect(result.map(c => c.registrationNumber)).toEqual(['CRN0', 'CRN1', 'CRN2']);
  });

  it('resolves a day conflict in favour of the higher priority', () => {
    const math = makeCourse({
      registrationNumber: 'math',
      subject: 'MATH',
      courseNumber: '2211',
      seatsAvailable: 40,
      seatsTotal: 40,
      time: { start: '11:00', end: '12:15' },
    });
    const csc = makeCourse({ registrationNumber: 'csc', seatsTotal: null });
    const set = preferenceSet([
      { subject: 'MATH', priority: 2, preferredTimes: [{ days: ['Mon'] }] },
      { subject: 'CSC', priority: 1 },
    ]);

    const dayResult = matchCourses(set, [math, csc]);
    expect(dayResult.map(c => [c.registrationNumber, c.priority, c.matchScore])).toEqual([['csc', 1, 55]]);

    const timeResult = matchCourses({ ...set, conflictMode: 'time' }, [math, csc]);
    expect(timeResult.map(c => c.registrationNumber)).toEqual(['csc', 'math']);
  });

  it('deduplicates by registration number, first preference wins', () => {
    const pool = [
      makeCourse({ registrationNumber: '1', courseNumber: '1301', days: ['Mon'] }),
      makeCourse({ registrationNumber: '2', courseNumber: '2720', days: ['Tue'] }),
    ];
    const set = preferenceSet([
      { subject: 'CSC', courseNumber: '1301', priority: 1 },
      { subject: 'CSC', priority: 2 },
    ]);
    expect(matchCourses(set, pool).map(c => [c.registrationNumber, c.priority])).toEqual([
      ['1', 1],
      ['2', 2],
    ]);
  });

  it('never exceeds the credit cap', () => {
    const pool = [
      makeCourse({ registrationNumber: 'a', subject: 'CSC', credits: 4, days: ['Mon'] }),
      makeCourse({ registrationNumber: 'b', subject: 'MATH', credits: 4, days: ['Tue'] }),
      makeCourse({ registrationNumber: 'c', subject: 'ENGL', credits: 3, days: ['Wed'] }),
    ];
    const set = preferenceSet(
      [
        { subject: 'CSC', priority: 1 },
        { subject: 'MATH', priority: 2 },
        { subject: 'ENGL', priority: 3 },
      ],
      { maxCredits: 8 },
    );
    const result = matchCourses(set, pool);
    expect(result.map(c => c.registrationNumber)).toEqual(['a', 'b']);
    expect(result.reduce((sum, c) => sum + c.credits, 0)).toBeLessThanOrEqual(8);
  });

  it('fills remaining credit headroom with a smaller later course', () => {
    const pool = [
      makeCourse({ registrationNumber: 'a', subject: 'CSC', credits: 4, days: ['Mon'] }),
      makeCourse({ registrationNumber: 'b', subject: 'MATH', credits: 4, days: ['Tue'] }),
      makeCourse({ registrationNumber: 'c', subject: 'ENGL', credits: 1, days: ['Wed'] }),
    ];
    const set = preferenceSet(
      [
        { subject: 'CSC', priority: 1 },
        { subject: 'MATH', priority: 2 },
        { subject: 'ENGL', priority: 3 },
      ],
      { maxCredits: 5 },
    );
    expect(matchCourses(set, pool).map(c => c.registrationNumber)).toEqual(['a', 'c']);
  });

  it('excludes completed courses', () => {
    const pool = [
      makeCourse({ registrationNumber: '1', courseNumber: '1301', days: ['Mon'] }),
      makeCourse({ registrationNumber: '2', courseNumber: '2720', days: ['Tue'] }),
    ];
    const result = matchCourses(preferenceSet([{ subject: 'CSC', priority: 1 }]), pool, [
      { subject: 'CSC', courseNumber: '1301' },
    ]);
    expect(result.map(c => c.registrationNumber)).toEqual(['2']);
  });

  it('attaches ratings by instructor name', () => {
    const rating = makeRating();
    const result = matchCourses(
      preferenceSet([{ subject: 'CSC', priority: 1 }]),
      [makeCourse()],
      [],
      new Map([['Jane Smith', rating]]),
    );
    expect(result[0].rating).toEqual(rating);
  });

  it('is deterministic and leaves its inputs untouched', () => {
    const pool: CourseRecord[] = [
      makeCourse({ registrationNumber: '1', days: ['Mon'], seatsAvailable: 5 }),
      makeCourse({ registrationNumber: '2', days: ['Mon'], seatsAvailable: 5 }),
      makeCourse({ registrationNumber: '3', subject: 'MATH', days: ['Tue'], deliveryMode: 'online' }),
    ];
    const set = preferenceSet([
      { subject: 'CSC', priority: 1 },
      { subject: 'MATH', priority: 2 },
    ]);
    const before = JSON.stringify({ set, pool });

    const first = matchCourses(set, pool);
    const second = matchCourses(set, pool);

    expect(second).toEqual(first);
    expect(first.map(c => c.registrationNumber)).toEqual(['1', '3']);
    expect(JSON.stringify({ set, pool })).toBe(before);
    expect(first[0]).not.toBe(pool[0]);
    expect(first[0].days).not.toBe(pool[0].days);
  });
});
