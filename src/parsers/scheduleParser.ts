/**
 * Schedule Parser
 *
 * The search results page is a run of `table.datadisplaytable` blocks in
 * header/detail pairs:
 *   header: <caption class="captiontext">Title - CRN - SUBJ NUM - Section</caption>
 *   detail: column labels, then one row per meeting pattern
 *           (Type | Time | Days | Where | Date Range | Schedule Type | Instructors)
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { CourseRecord, DeliveryMode, TimeRange, Weekday } from '../types.js';

const COMPONENT = 'Parser';

export const DEFAULT_CREDITS = 3;

const DAY_CODES: Record<string, Weekday> = {
  M: 'Mon',
  T: 'Tue',
  W: 'Wed',
  R: 'Thu',
  F: 'Fri',
  S: 'Sat',
  U: 'Sun',
};

const ONLINE_KEYWORDS = ['ONLINE', 'WEB', 'INTERNET', 'VIRTUAL'];
const PLACEHOLDER = 'TBA';
const MIN_DETAIL_CELLS = 7;

interface CaptionParts {
  title: string;
  registrationNumber: string;
  subject: string;
  courseNumber: string;
  section: string;
}

export interface SeatCounts {
  available: number | null;
  total: number | null;
}

/**
 * "MWF" → ['Mon', 'Wed', 'Fri'], "TR" → ['Tue', 'Thu']. Unknown characters are ignored.
 */
export function parseDays(daysStr: string): Weekday[] {
  const days: Weekday[] = [];
  for (const char of daysStr.toUpperCase()) {
    const day = DAY_CODES[char];
    if (day && !days.includes(day)) days.push(day);
  }
  return days;
}

function toClock(hours: number, minutes: number, meridiem: string | undefined): string {
  let h = hours;
  const suffix = meridiem?.toLowerCase();
  if (suffix === 'pm' && h < 12) h += 12;
  if (suffix === 'am' && h === 12) h = 0;
  return `${String(h).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * "9:30 am - 10:45 am" → { start: "09:30", end: "10:45" }
 */
export function parseTimeRange(text: string): TimeRange | null {
  const match = text.match(/(\d{1,2}):(\d{2})\s*([ap]m)?\s*-\s*(\d{1,2}):(\d{2})\s*([ap]m)?/i);
  if (!match) return null;

  const [, startH, startM, startAp, endH, endM, endAp] = match;
  // "9:30 - 10:45 am" shares the trailing meridiem; a range that reaches
  // or starts at 12 crosses noon, so the start stays as written
  const shares = Number(startH) <= Number(endH) && Number(startH) !== 12 && Number(endH) !== 12;
  const startMeridiem = startAp ?? (shares ? endAp : undefined);
  return {
    start: toClock(Number(startH), Number(startM), startMeridiem),
    end: toClock(Number(endH), Number(endM), endAp),
  };
}

/**
 * "Dr.  Jane   Smith (P) (jsmith@school.edu)" → "Jane Smith"
 */
export function cleanInstructorName(name: string): string {
  return name
    .split(/\s+/)
    .join(' ')
    .replace(/\b(Dr\.|Prof\.|Mr\.|Ms\.|Mrs\.)\s*/gi, '')
    .replace(/\s*\([^)]*@[^)]*\)/g, '')
    .replace(/\s*\([A-Z]\)/g, '')
    .trim();
}

export function isOnlineLocation(location: string): boolean {
  const upper = location.toUpperCase();
  return ONLINE_KEYWORDS.some(keyword => upper.includes(keyword));
}

/**
 * Seat counts from free text. Tries "5/30" and "5 of 30" first, then
 * forms that only carry the available count.
 */
export function extractSeats(text: string, linkText = ''): SeatCounts | null {
  const pair =
    linkText.match(/(\d+)\s*(?:\/|of)\s*(\d+)/) ??
    text.match(/(?<![\d/])(\d{1,4})\s*\/\s*(\d{1,4})(?![\d/])/);
  if (pair) {
    const available = Number(pair[1]);
    const total = Number(pair[2]);
    return { available, total: total >= available ? total : null };
  }

  const patterns = [/Seats\s+Avail[^:]*:\s*(\d+)/i, /Available:\s*(\d+)/i, /(\d+)\s+(?:seats?\s+)?remain/i];
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) return { available: Number(match[1]), total: null };
  }
  return null;
}

/**
 * "3.000 Credits", "Credits: 4", "3 Credit Hours"
 */
export function extractCredits(text: string): number | null {
  const patterns = [
    /(\d+(?:\.\d+)?)\s+Credits?/i,
    /Credits?:\s*(\d+(?:\.\d+)?)/i,
    /(\d+(?:\.\d+)?)\s+(?:Credit\s+)?Hours?/i,
  ];
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      const credits = Math.trunc(Number.parseFloat(match[1]));
      if (Number.isFinite(credits)) return credits;
    }
  }
  return null;
}

/**
 * Split a header caption. The last three segments are CRN, course code and
 * section; anything before them is the title (titles may contain " - ").
 */
export function parseCaption(caption: string): CaptionParts | null {
  const parts = caption.split(' - ').map(p => p.trim());
  if (parts.length < 4) return null;

  const section = parts[parts.length - 1];
  const code = parts[parts.length - 2].split(/\s+/);
  const registrationNumber = parts[parts.length - 3];
  const title = parts.slice(0, parts.length - 3).join(' - ');
  if (code.length < 2 || !registrationNumber) return null;

  return {
    title,
    registrationNumber,
    subject: code[0].toUpperCase(),
    courseNumber: code[1],
    section,
  };
}

function cellText($: cheerio.CheerioAPI, cell: Element): string {
  return $(cell).text().replace(/\s+/g, ' ').trim();
}

/**
 * Cell-by-cell text of a table, space separated so adjacent cells never run together
 */
function blockText($: cheerio.CheerioAPI, table: cheerio.Cheerio<Element>): string {
  return table
    .find('caption, th, td')
    .toArray()
    .map(cell => cellText($, cell))
    .join(' ');
}

function isUsable(value: string): boolean {
  return value !== '' && value.toUpperCase() !== PLACEHOLDER;
}

function parseCoursePair(
  $: cheerio.CheerioAPI,
  header: cheerio.Cheerio<Element>,
  detail: cheerio.Cheerio<Element>,
): CourseRecord | null {
  const caption = header.children('caption.captiontext').first().text().replace(/\s+/g, ' ').trim();
  const parts = parseCaption(caption);
  if (!parts) {
    logger.debug(COMPONENT, `Malformed caption skipped: "${caption}"`);
    return null;
  }

  let time: TimeRange | null = null;
  let days: Weekday[] = [];
  let location: string | null = null;
  let instructor: string | null = null;
  let deliveryMode: DeliveryMode = 'in-person';
  let hybrid = false;

  // Only the first usable value of each field is kept; later meeting patterns are ignored
  for (const row of detail.find('tr').toArray().slice(1)) {
    const cells = $(row).find('td').toArray();
    if (cells.length < MIN_DETAIL_CELLS) continue;

    const meetingTime = cellText($, cells[1]);
    const meetingDays = cellText($, cells[2]);
    const where = cellText($, cells[3]);
    const scheduleType = cellText($, cells[5]);
    const instructors = cellText($, cells[6]);

    if (!time && isUsable(meetingTime)) {
      time = parseTimeRange(meetingTime);
    }
    if (days.length === 0 && isUsable(meetingDays)) {
      days = parseDays(meetingDays);
    }
    if (!location && isUsable(where)) {
      location = where;
      if (isOnlineLocation(where)) deliveryMode = 'online';
    }
    if (!instructor && isUsable(instructors)) {
      instructor = cleanInstructorName(instructors) || null;
    }
    if (/hybrid/i.test(scheduleType) || /hybrid/i.test(where)) {
      hybrid = true;
    }
  }

  if (deliveryMode === 'in-person' && hybrid) deliveryMode = 'hybrid';

  const text = `${blockText($, header)} ${blockText($, detail)}`;
  const linkText = header.find('a[href*="bwckschd.p_disp_detail_sched"]').text();
  const seats = extractSeats(text, linkText);

  return {
    registrationNumber: parts.registrationNumber,
    subject: parts.subject,
    courseNumber: parts.courseNumber,
    section: parts.section,
    title: parts.title,
    credits: extractCredits(text) ?? DEFAULT_CREDITS,
    instructor,
    days,
    time,
    location,
    deliveryMode,
    seatsAvailable: seats?.available ?? null,
    seatsTotal: seats?.total ?? null,
  };
}

/**
 * Parse a schedule search result document into course records.
 * Blocks that are not headers are stepped over one at a time so a stray
 * table never shifts the pairing of the blocks after it.
 */
export function parseSchedule(html: string): CourseRecord[] {
  const $ = cheerio.load(html);
  const tables = $('table.datadisplaytable').toArray();
  const courses: CourseRecord[] = [];

  let i = 0;
  while (i < tables.length - 1) {
    const header = $(tables[i]);
    if (header.children('caption.captiontext').length === 0) {
      i += 1;
      continue;
    }

    try {
      const course = parseCoursePair($, header, $(tables[i + 1]));
      if (course) courses.push(course);
    } catch (err) {
      logger.warn(COMPONENT, `Skipping course block ${i}: ${errorMessage(err)}`);
    }
    i += 2;
  }

  return courses;
}
