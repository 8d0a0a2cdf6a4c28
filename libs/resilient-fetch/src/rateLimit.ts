import { setTimeout as delay } from 'timers/promises';
import type { RateLimiter } from './types';

/**
 * Spaces request starts at least `1000 / maxPerSecond` milliseconds apart.
 */
export class IntervalRateLimiter implements RateLimiter {
  private readonly minIntervalMs: number;
  private lastTs = 0;

  constructor(
    maxPerSecond: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void> = (ms, signal) =>
      delay(ms, undefined, { signal }),
  ) {
    if (!(maxPerSecond > 0)) {
      throw new Error('maxPerSecond must be > 0');
    }
    this.minIntervalMs = 1000 / maxPerSecond;
  }

  async throttle(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const waitMs = this.minIntervalMs - (now - this.lastTs);
    if (waitMs > 0) {
      await this.sleep(waitMs, signal);
      this.lastTs = this.now();
    } else {
      this.lastTs = now;
    }
  }
}
