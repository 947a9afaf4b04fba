/**
 * Runtime configuration, read from the environment (.env is loaded by the CLI)
 */

import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const envSchema = z.object({
  SCHEDULE_BASE_URL: z.string().url().default('https://www.gosolar.gsu.edu'),
  SCHEDULE_TERM_PATH: z.string().default('/bprod/bwckgens.p_proc_term_date'),
  SCHEDULE_SEARCH_PATH: z.string().default('/bprod/bwckschd.p_get_crse_unsec'),

  RATINGS_API_URL: z.string().url().default('https://www.ratemyprofessors.com/graphql'),
  RATINGS_PROFILE_BASE_URL: z.string().url().default('https://www.ratemyprofessors.com'),
  RATINGS_SCHOOL_ID: z.string().min(1).default('U2Nob29sLTM1MQ=='),
  RATINGS_AUTHORIZATION: z.string().default('Basic dGVzdDp0ZXN0'),

  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  MAX_RETRIES: positiveInt(3),
  RETRY_DELAY_MS: nonNegativeInt(2_000),
  RETRY_MAX_DELAY_MS: nonNegativeInt(10_000),
  MAX_CONCURRENT_REQUESTS: positiveInt(5),
  SUBJECT_DELAY_MS: nonNegativeInt(2_000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),

  CACHE_TTL_COURSES: positiveInt(3_600),
  CACHE_TTL_RATINGS: positiveInt(86_400),
  MEMORY_CACHE_SIZE: positiveInt(500),
  REDIS_URL: z.string().min(1).optional(),
  DATABASE_PATH: z.string().min(1).default('section-scout.db'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  schedule: {
    baseUrl: string;
    termPath: string;
    searchPath: string;
  };
  ratings: {
    apiUrl: string;
    profileBaseUrl: string;
    schoolId: string;
    authorization: string;
  };
  http: {
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    retryMaxDelayMs: number;
    maxConcurrentRequests: number;
    subjectDelayMs: number;
    userAgent: string;
  };
  cache: {
    courseTtlSeconds: number;
    ratingTtlSeconds: number;
    memorySize: number;
    redisUrl: string | null;
    databasePath: string;
  };
  log: {
    level: Env['LOG_LEVEL'];
    dir: string | null;
  };
}

export function parseEnv(input: Partial<Record<string, string>>): Env {
  // Treat empty strings as unset so `FOO=` in .env falls back to the default
  const cleaned = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined && value !== ''));
  return envSchema.parse(cleaned);
}

export function loadConfig(input: Partial<Record<string, string>> = process.env): AppConfig {
  const env = parseEnv(input);
  return Object.freeze({
    schedule: {
      baseUrl: env.SCHEDULE_BASE_URL.replace(/\/+$/, ''),
      termPath: env.SCHEDULE_TERM_PATH,
      searchPath: env.SCHEDULE_SEARCH_PATH,
    },
    ratings: {
      apiUrl: env.RATINGS_API_URL,
      profileBaseUrl: env.RATINGS_PROFILE_BASE_URL.replace(/\/+$/, ''),
      schoolId: env.RATINGS_SCHOOL_ID,
      authorization: env.RATINGS_AUTHORIZATION,
    },
    http: {
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      maxRetries: env.MAX_RETRIES,
      retryDelayMs: env.RETRY_DELAY_MS,
      retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxConcurrentRequests: env.MAX_CONCURRENT_REQUESTS,
      subjectDelayMs: env.SUBJECT_DELAY_MS,
      userAgent: env.USER_AGENT,
    },
    cache: {
      courseTtlSeconds: env.CACHE_TTL_COURSES,
      ratingTtlSeconds: env.CACHE_TTL_RATINGS,
      memorySize: env.MEMORY_CACHE_SIZE,
      redisUrl: env.REDIS_URL ?? null,
      databasePath: env.DATABASE_PATH,
    },
    log: {
      level: env.LOG_LEVEL,
      dir: env.LOG_DIR ?? null,
    },
  });
}
