/**
 * Retry with exponential backoff
 *
 * Applied at the call site by both fetchers. Only errors the predicate
 * accepts (transient network failures by default) are retried.
 */

import { errorMessage, isTransientError } from '../errors.js';
import { logger } from '../logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;  // first wait, also the floor
  maxDelayMs: number;   // ceiling
}

export interface RetryOptions {
  label: string;
  shouldRetry?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Wait before attempt `failedAttempt + 1`: base, 2·base, 4·base … capped at maxDelayMs
 */
export function backoffDelay(failedAttempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, failedAttempt - 1);
  return Math.min(Math.max(exponential, policy.baseDelayMs), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= attempts || !shouldRetry(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, policy);
      logger.warn(
        'Retry',
        `${options.label} attempt ${attempt}/${attempts} failed (${errorMessage(err)}); retrying in ${delayMs}ms`,
      );
      await wait(delayMs);
    }
  }
}
