import type { ApiRecord } from './types';

export interface WatermarkTrackerOptions {
  /** Record field holding the cursor value, e.g. `date_filed`. */
  field: string;
  /**
   * Keep only this many leading characters of the value. Use 10 for
   * date-like fields so `2024-03-01T12:00:00Z` compares as `2024-03-01`.
   */
  prefixLength?: number;
}

/**
 * Keeps the largest cursor value observed during one fetch session. Values
 * compare as strings, which orders ISO dates correctly. Records without the
 * field are ignored.
 */
export class WatermarkTracker {
  private readonly field: string;
  private readonly prefixLength?: number;
  private max: string | undefined;

  constructor(options: WatermarkTrackerOptions) {
    if (options.prefixLength !== undefined && !(options.prefixLength > 0)) {
      throw new RangeError(`prefixLength must be > 0, got ${options.prefixLength}`);
    }
    this.field = options.field;
    this.prefixLength = options.prefixLength;
  }

  observe(record: ApiRecord): void {
    const value = this.extract(record);
    if (value !== undefined && (this.max === undefined || value > this.max)) {
      this.max = value;
    }
  }

  current(): string | undefined {
    return this.max;
  }

  private extract(record: ApiRecord): string | undefined {
    const raw = record[this.field];
    if (typeof raw !== 'string' && typeof raw !== 'number') {
      return undefined;
    }
    const text = String(raw);
    if (!text) {
      return undefined;
    }
    return this.prefixLength === undefined ? text : text.slice(0, this.prefixLength);
  }
}

/**
 * Passes every record of `source` through unchanged while feeding it to the
 * tracker.
 */
export async function* trackWatermark<TRecord extends ApiRecord, TReturn>(
  source: AsyncIterator<TRecord, TReturn> & AsyncIterable<TRecord>,
  tracker: WatermarkTracker,
): AsyncGenerator<TRecord, TReturn, void> {
  try {
    while (true) {
      const next = await source.next();
      if (next.done) {
        return next.value;
      }
      tracker.observe(next.value);
      yield next.value;
    }
  } finally {
    await source.return?.();
  }
}
