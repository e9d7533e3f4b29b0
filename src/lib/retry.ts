/**
 * Bounded retry with exponential backoff
 */

import type { RetryPolicy } from './config.js';
import type { Clock } from './time.js';

/**
 * Delay before retry number `retry` (1-based):
 * baseDelayMs * factor^(retry - 1), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, retry - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Full delay schedule for a policy, e.g. [2000, 4000] for three attempts.
 */
export function backoffSchedule(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  for (let retry = 1; retry < policy.attempts; retry++) {
    delays.push(backoffDelay(policy, retry));
  }
  return delays;
}

export interface RetryOptions {
  policy: RetryPolicy;
  clock: Clock;
  /** Errors for which this returns false are rethrown immediately. */
  shouldRetry: (error: unknown) => boolean;
  /** Checked after each backoff sleep; an aborted signal ends the loop. */
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` at most `policy.attempts` times. The last error is rethrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, clock, shouldRetry, onRetry, signal } = options;
  let attempt = 1;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(error, attempt, delayMs);
      await clock.sleep(delayMs);
      signal?.throwIfAborted();
      attempt++;
    }
  }
}
