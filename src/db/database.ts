/**
 * Database Module
 * Durable cache tier and scrape log on SQLite
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { normalizeInstructorName } from '../cache/keys.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { courseRecordSchema, ratingRecordSchema } from '../schemas.js';
import type { CourseRecord, RatingRecord, ScrapeLogEntry, ScrapeSource, ScrapeStatus } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const COMPONENT = 'Database';
const MAX_ERROR_LENGTH = 500;

interface RawDataRow {
  raw_data: string;
}

interface CountRow {
  count: number;
}

export interface ScrapeLogRow {
  id: number;
  source: ScrapeSource;
  operation: string;
  status: ScrapeStatus;
  term: string | null;
  subject: string | null;
  items_found: number;
  duration_ms: number | null;
  error_message: string | null;
  created_at: string;
}

export interface StoreStats {
  ratings: number;
  courses: number;
  logs: number;
}

export class CacheDatabase {
  private db: Database.Database;

  constructor(dbPath: string = 'section-scout.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug(COMPONENT, 'Schema ready');
  }

  // ============ Ratings ============

  /**
   * Unexpired rating for an instructor at a school, or null
   */
  getRating(instructorName: string, schoolId: string, now: number = Date.now()): RatingRecord | null {
    try {
      const row = this.db
        .prepare<[string, string, number], RawDataRow>(
          `SELECT raw_data FROM rating_cache
           WHERE instructor_name = ? AND school_id = ? AND expires_at > ?`,
        )
        .get(normalizeInstructorName(instructorName), schoolId, now);
      if (!row) return null;

      const parsed = ratingRecordSchema.safeParse(JSON.parse(row.raw_data));
      if (!parsed.success) {
        logger.warn(COMPONENT, `Ignoring malformed rating row for ${instructorName}`);
        return null;
      }
      return parsed.data;
    } catch (err) {
      logger.warn(COMPONENT, `Rating read failed for ${instructorName}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Insert or refresh a rating, keyed by (normalized name, school)
   */
  upsertRating(rating: RatingRecord, ttlSeconds: number): boolean {
    try {
      const expiresAt = Date.now() + ttlSeconds * 1000;
      this.db
        .prepare(
          `INSERT INTO rating_cache
             (instructor_name, school_id, source_id, avg_rating, avg_difficulty,
              would_take_again_percent, num_ratings, department, top_courses, raw_data, expires_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (instructor_name, school_id) DO UPDATE SET
             source_id = excluded.source_id,
             avg_rating = excluded.avg_rating,
             avg_difficulty = excluded.avg_difficulty,
             would_take_again_percent = excluded.would_take_again_percent,
             num_ratings = excluded.num_ratings,
             department = excluded.department,
             top_courses = excluded.top_courses,
             raw_data = excluded.raw_data,
             updated_at = CURRENT_TIMESTAMP,
             expires_at = excluded.expires_at`,
        )
        .run(
          normalizeInstructorName(rating.instructorName),
          rating.schoolId,
          rating.sourceId,
          rating.avgRating,
          rating.avgDifficulty,
          rating.wouldTakeAgainPercent,
          rating.numRatings,
          rating.department,
          JSON.stringify(rating.topCourses),
          JSON.stringify(rating),
          expiresAt,
        );
      return true;
    } catch (err) {
      logger.warn(COMPONENT, `Rating write failed for ${rating.instructorName}: ${errorMessage(err)}`);
      return false;
    }
  }

  // ============ Courses ============

  /**
   * Unexpired courses for a (term, subject), or null when none are stored
   */
  getCourses(term: string, subject: string, now: number = Date.now()): CourseRecord[] | null {
    try {
      const rows = this.db
        .prepare<[string, string, number], RawDataRow>(
          `SELECT raw_data FROM course_cache
           WHERE term = ? AND subject = ? AND expires_at > ?
           ORDER BY rowid`,
        )
        .all(term, subject.toUpperCase(), now);
      if (rows.length === 0) return null;

      const courses: CourseRecord[] = [];
      for (const row of rows) {
        const parsed = courseRecordSchema.safeParse(JSON.parse(row.raw_data));
        if (parsed.success) courses.push(parsed.data);
      }
      return courses.length > 0 ? courses : null;
    } catch (err) {
      logger.warn(COMPONENT, `Course read failed for ${subject} ${term}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Replace the stored snapshot of a (term, subject)
   */
  saveCourses(term: string, subject: string, courses: CourseRecord[], ttlSeconds: number): boolean {
    const expiresAt = Date.now() + ttlSeconds * 1000;

    try {
      const deleteStmt = this.db.prepare(`DELETE FROM course_cache WHERE term = ? AND subject = ?`);
      const insertStmt = this.db.prepare(`
        INSERT OR REPLACE INTO course_cache
          (term, registration_number, subject, course_number, instructor, seats_available, raw_data, expires_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const transaction = this.db.transaction((records: CourseRecord[]) => {
        deleteStmt.run(term, subject.toUpperCase());
        for (const course of records) {
          insertStmt.run(
            term,
            course.registrationNumber,
            course.subject.toUpperCase(),
            course.courseNumber,
            course.instructor,
            course.seatsAvailable,
            JSON.stringify(course),
            expiresAt,
          );
        }
      });

      transaction(courses);
      logger.debug(COMPONENT, `Saved ${courses.length} ${subject} courses for ${term}`);
      return true;
    } catch (err) {
      logger.warn(COMPONENT, `Course write failed for ${subject} ${term}: ${errorMessage(err)}`);
      return false;
    }
  }

  // ============ Scrape Log ============

  recordScrape(entry: ScrapeLogEntry): void {
    try {
      this.db
        .prepare(
          `INSERT INTO scrape_log
             (source, operation, status, term, subject, query_params, items_found, duration_ms, error_message)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          entry.source,
          entry.operation,
          entry.status,
          entry.term ?? null,
          entry.subject ?? null,
          entry.query ? JSON.stringify(entry.query) : null,
          entry.itemsFound ?? 0,
          entry.durationMs ?? null,
          entry.errorMessage ? entry.errorMessage.slice(0, MAX_ERROR_LENGTH) : null,
        );
    } catch (err) {
      logger.warn(COMPONENT, `Scrape log write failed: ${errorMessage(err)}`);
    }
  }

  recentLogs(limit = 20): ScrapeLogRow[] {
    return this.db
      .prepare<[number], ScrapeLogRow>(
        `SELECT id, source, operation, status, term, subject, items_found, duration_ms, error_message, created_at
         FROM scrape_log ORDER BY id DESC LIMIT ?`,
      )
      .all(limit);
  }

  /**
   * Get statistics
   */
  getStats(): StoreStats {
    const count = (table: 'rating_cache' | 'course_cache' | 'scrape_log'): number =>
      this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;
    return {
      ratings: count('rating_cache'),
      courses: count('course_cache'),
      logs: count('scrape_log'),
    };
  }

  /**
   * Close database
   */
  close(): void {
    this.db.close();
  }
}
