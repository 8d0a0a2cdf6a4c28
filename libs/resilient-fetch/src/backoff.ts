import type { BackoffPolicy } from './types';

export const DEFAULT_BACKOFF_BASE_MS = 1_500;

/**
 * Exponential backoff without jitter: `baseDelayMs * 2^(attempt - 1)`.
 *
 * @param attempt - The attempt that just failed (1-based)
 * @param baseDelayMs - Wait after the first failed attempt
 * @returns Delay in milliseconds before the next attempt
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number = DEFAULT_BACKOFF_BASE_MS): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`attempt must be a positive integer, got ${attempt}`);
  }
  if (!(baseDelayMs > 0)) {
    throw new RangeError(`baseDelayMs must be > 0, got ${baseDelayMs}`);
  }
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Create a backoff policy with a preset base.
 *
 * @example
 * ```typescript
 * const backoff = createBackoffPolicy({ baseDelayMs: 1500 });
 *
 * backoff.delay(1); // 1500
 * backoff.delay(3); // 6000
 * ```
 */
export function createBackoffPolicy(options: { baseDelayMs?: number } = {}): BackoffPolicy {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF_BASE_MS;
  // Fail at construction rather than on the first retry.
  computeBackoffDelay(1, baseDelayMs);

  return {
    delay: (attempt: number): number => computeBackoffDelay(attempt, baseDelayMs),
  };
}
