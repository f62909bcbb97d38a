/**
 * Bounded retry for transient infrastructure errors
 */

import { createChildLogger, isRetryableError } from '@tidewater/shared';
import type { RetryPolicy } from './types.js';

const logger = createChildLogger({ component: 'Retry' });

export interface RetryOptions {
  /** Label used in logs */
  operation: string;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Exponential backoff delay for a 1-based attempt, capped at maxDelayMs,
 * with +/- jitterFactor of random spread
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const baseDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(baseDelay, policy.maxDelayMs);
  const jitterRange = cappedDelay * policy.jitterFactor;
  const jitter = (random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation, retrying only retryable errors (TransientInfraError)
 * up to policy.maxAttempts times. Anything else is rethrown at once.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (!isRetryableError(error) || attempt >= policy.maxAttempts) {
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy, options.random);
      logger.warn(
        {
          operation: options.operation,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        },
        'Transient failure, retrying'
      );

      await wait(delayMs);
      attempt++;
    }
  }
}
