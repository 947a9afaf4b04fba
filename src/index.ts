#!/usr/bin/env node
/**
 * Section Scout - CLI Entry Point
 * Finds open sections that fit a student's preferences
 */

import { readFileSync } from 'fs';
import { config } from 'dotenv';
import { Command } from 'commander';
import { ZodError, type z } from 'zod';
import { loadConfig, type AppConfig } from './config.js';
import { createEngine, type Engine } from './engine.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { completedCoursesSchema, preferenceSetSchema } from './schemas.js';
import type { CourseRecord, MatchedCourse, RatingRecord } from './types.js';

// Load environment variables
config();

function readJsonFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  return schema.parse(raw);
}

function formatMeeting(course: CourseRecord): string {
  const days = course.days.length > 0 ? course.days.join('/') : 'TBA';
  const time = course.time ? `${course.time.start}-${course.time.end}` : '';
  return `${days} ${time}`.trim();
}

function formatSeats(course: CourseRecord): string {
  if (course.seatsAvailable === null) return '?';
  return course.seatsTotal === null ? `${course.seatsAvailable}` : `${course.seatsAvailable}/${course.seatsTotal}`;
}

function printCourse(course: CourseRecord): void {
  const code = `${course.subject} ${course.courseNumber}-${course.section}`;
  console.log(
    `  ${course.registrationNumber.padEnd(7)} ${code.padEnd(15)} ${course.title.substring(0, 32).padEnd(33)}` +
      `${formatMeeting(course).padEnd(22)} ${course.deliveryMode.padEnd(10)} seats ${formatSeats(course)}`,
  );
}

function printMatch(course: MatchedCourse): void {
  const rating = course.rating?.avgRating;
  console.log(
    `  P${course.priority} ${course.matchScore.toFixed(1).padStart(5)}  ${course.subject} ${course.courseNumber}-${course.section}`.padEnd(28) +
      ` ${course.title.substring(0, 32).padEnd(33)}${formatMeeting(course).padEnd(22)}` +
      ` ${(course.instructor ?? 'TBA').padEnd(22)} ${rating !== undefined && rating !== null ? `★ ${rating.toFixed(1)}` : ''}`,
  );
}

function printRating(name: string, rating: RatingRecord | null): void {
  if (!rating) {
    console.log(`  ${name.padEnd(28)} not found`);
    return;
  }
  const fmt = (value: number | null, digits = 1) => (value === null ? '?' : value.toFixed(digits));
  console.log(
    `  ${name.padEnd(28)} ★ ${fmt(rating.avgRating)}  difficulty ${fmt(rating.avgDifficulty)}` +
      `  again ${fmt(rating.wouldTakeAgainPercent, 0)}%  (${rating.numRatings} ratings)` +
      `${rating.department ? `  ${rating.department}` : ''}`,
  );
}

/**
 * Build the engine, run one command, and always release its connections
 */
async function withEngine(name: string, run: (engine: Engine) => Promise<void>): Promise<void> {
  let appConfig: AppConfig;
  try {
    appConfig = loadConfig();
  } catch (err) {
    console.error('❌ Invalid configuration');
    console.error(err instanceof ZodError ? err.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n') : errorMessage(err));
    process.exit(1);
  }

  logger.startSession(name, appConfig.log.dir);
  const engine = createEngine(appConfig);
  try {
    await run(engine);
  } finally {
    await engine.close();
  }
}

const program = new Command();

program
  .name('section-scout')
  .description('Find open course sections that fit your preferences')
  .version('1.0.0');

program
  .command('fetch')
  .description('Fetch and parse sections for one or more subjects')
  .argument('<term>', 'term code (e.g. 202508)')
  .argument('<subjects...>', 'subject codes (e.g. CSC MATH)')
  .option('--all', 'include full and unknown-seat sections')
  .option('--no-cache', 'skip cached data and fetch live')
  .action(async (term: string, subjects: string[], opts: { all?: boolean; cache: boolean }) => {
    await withEngine('fetch', async engine => {
      const started = Date.now();
      const { courses, failedSubjects } = await engine.schedule.getAvailableCourses(term, subjects, {
        openOnly: !opts.all,
        useCache: opts.cache,
      });

      console.log(`\n📅 ${courses.length} sections for ${term}\n`);
      courses.forEach(printCourse);

      logger.summary('Fetch Complete', {
        Subjects: subjects.length,
        Failed: failedSubjects.length > 0 ? failedSubjects.join(', ') : 'none',
        Sections: courses.length,
        'Time elapsed': `${((Date.now() - started) / 1000).toFixed(1)}s`,
      });
    });
  });

program
  .command('search')
  .description('Search open and closed sections of a subject')
  .argument('<term>', 'term code')
  .argument('<subject>', 'subject code')
  .option('-n, --number <courseNumber>', 'course number')
  .option('-k, --keyword <keyword>', 'keyword in title or course code')
  .action(async (term: string, subject: string, opts: { number?: string; keyword?: string }) => {
    await withEngine('search', async engine => {
      const courses = await engine.schedule.searchCourses(term, {
        subject,
        courseNumber: opts.number,
        keyword: opts.keyword,
      });
      console.log(`\n🔎 ${courses.length} matching sections\n`);
      courses.forEach(printCourse);
    });
  });

program
  .command('rating')
  .description('Look up instructor ratings')
  .argument('<names...>', 'instructor names (quote full names)')
  .action(async (names: string[]) => {
    await withEngine('rating', async engine => {
      const ratings = await engine.ratings.batchGetRatings(names);
      console.log('\n⭐ Instructor ratings\n');
      for (const [name, rating] of ratings) printRating(name, rating);
    });
  });

program
  .command('match')
  .description('Match preferences against available sections')
  .argument('<term>', 'term code')
  .argument('<preferencesFile>', 'JSON preference set')
  .option('-c, --completed <file>', 'JSON list of completed courses')
  .option('--no-ratings', 'skip instructor ratings')
  .option('--no-cache', 'skip cached data and fetch live')
  .action(async (term: string, file: string, opts: { completed?: string; ratings: boolean; cache: boolean }) => {
    const preferences = readJsonFile(file, preferenceSetSchema);
    const completed = opts.completed ? readJsonFile(opts.completed, completedCoursesSchema) : [];

    await withEngine('match', async engine => {
      const result = await engine.discovery.discover(term, preferences, completed, {
        includeRatings: opts.ratings,
        useCache: opts.cache,
      });

      console.log(`\n🎯 ${result.matched.length} recommended sections\n`);
      result.matched.forEach(printMatch);

      logger.summary('Match Complete', {
        'Courses considered': result.poolSize,
        Matched: result.matched.length,
        'Total credits': result.totalCredits,
        'Failed subjects': result.failedSubjects.length > 0 ? result.failedSubjects.join(', ') : 'none',
      });
    });
  });

program
  .command('cache:clear')
  .description('Delete a cached key, or every key matching a glob (e.g. "courses:202508:*")')
  .argument('<pattern>', 'exact key or glob')
  .action(async (pattern: string) => {
    await withEngine('cache', async engine => {
      // Exact keys skip the scan
      const deleted = /[*?[]/.test(pattern)
        ? await engine.cache.deletePattern(pattern)
        : Number(await engine.cache.delete(pattern));
      console.log(`🧹 Deleted ${deleted} keys matching ${pattern}`);
    });
  });

program
  .command('stats')
  .description('Show durable store counts and recent fetches')
  .option('-l, --limit <n>', 'recent log entries to show', '10')
  .action(async (opts: { limit: string }) => {
    await withEngine('stats', async engine => {
      if (!engine.db) {
        console.error('❌ Durable store is unavailable');
        process.exitCode = 1;
        return;
      }
      const stats = engine.db.getStats();
      logger.summary('Durable Store', {
        'Cached ratings': stats.ratings,
        'Cached sections': stats.courses,
        'Scrape log entries': stats.logs,
        Database: engine.config.cache.databasePath,
      });

      for (const row of engine.db.recentLogs(parseInt(opts.limit, 10) || 10)) {
        const target = [row.term, row.subject].filter(Boolean).join(' ');
        console.log(
          `  ${row.created_at}  ${row.source.padEnd(8)} ${row.status.padEnd(9)} ${target.padEnd(14)} ` +
            `${row.items_found} items${row.error_message ? `  ${row.error_message}` : ''}`,
        );
      }
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error('❌ Error:', errorMessage(err));
  process.exitCode = 1;
});
