/**
 * Runtime schemas for values that cross a trust boundary:
 * cached JSON, preference files and upstream responses.
 */

import { z } from 'zod';
import {
  WEEKDAYS,
  type CompletedCourse,
  type CourseRecord,
  type PreferenceSet,
  type RatingRecord,
} from './types.js';

const clock = z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:MM');

export const weekdaySchema = z.enum(WEEKDAYS);

export const courseRecordSchema: z.ZodType<CourseRecord, z.ZodTypeDef, unknown> = z.object({
  registrationNumber: z.string().min(1),
  subject: z.string(),
  courseNumber: z.string(),
  section: z.string(),
  title: z.string(),
  credits: z.number().int().nonnegative(),
  instructor: z.string().nullable(),
  days: z.array(weekdaySchema),
  time: z.object({ start: clock, end: clock }).nullable(),
  location: z.string().nullable(),
  deliveryMode: z.enum(['in-person', 'online', 'hybrid']),
  seatsAvailable: z.number().int().nullable(),
  seatsTotal: z.number().int().nullable(),
});

export const courseListSchema = z.array(courseRecordSchema);

export const ratingRecordSchema: z.ZodType<RatingRecord, z.ZodTypeDef, unknown> = z.object({
  instructorName: z.string(),
  schoolId: z.string(),
  avgRating: z.number().min(0).max(5).nullable(),
  avgDifficulty: z.number().min(0).max(5).nullable(),
  wouldTakeAgainPercent: z.number().min(0).max(100).nullable(),
  numRatings: z.number().int().nonnegative(),
  department: z.string().nullable(),
  sourceId: z.string().nullable(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  schoolName: z.string().nullable(),
  profileUrl: z.string().nullable(),
  topCourses: z.array(z.string()).max(5),
});

const preferenceSchema = z.object({
  subject: z.string().trim().toUpperCase().pipe(z.string().regex(/^[A-Z]{2,4}$/, 'subject must be 2-4 letters')),
  courseNumber: z.string().trim().min(1).optional(),
  priority: z.number().int().default(1),
  onlineOnly: z.boolean().default(false),
  excludeInstructors: z.array(z.string().min(1)).default([]),
  preferredTimes: z
    .array(z.object({ days: z.array(weekdaySchema), start: clock.optional(), end: clock.optional() }))
    .default([]),
  minRating: z.number().min(0).max(5).optional(),
});

export const preferenceSetSchema: z.ZodType<PreferenceSet, z.ZodTypeDef, unknown> = z.object({
  preferences: z.array(preferenceSchema),
  maxCredits: z.number().int().positive().optional(),
  avoidTimeConflicts: z.boolean().default(true),
  preferOnline: z.boolean().default(false),
  includeUnknownSeats: z.boolean().default(false),
  conflictMode: z.enum(['day', 'time']).default('day'),
});

export const completedCoursesSchema: z.ZodType<CompletedCourse[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    subject: z.string().trim().toUpperCase(),
    courseNumber: z.string().trim(),
  }),
);
