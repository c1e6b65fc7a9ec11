import { InvalidInputError } from '../core/errors.js';

export type Granularity = 'hour' | 'day';

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Calendar bucket key in UTC: `YYYY-MM-DD-HH` for hours, `YYYY-MM-DD` for
 * days. Keys of one granularity sort chronologically as strings.
 */
export function bucketKey(date: Date, granularity: Granularity): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  return granularity === 'day' ? day : `${day}-${pad(date.getUTCHours())}`;
}

/**
 * Running totals per calendar bucket. Only ever increments within a bucket;
 * old buckets are evicted once they fall outside the retention period.
 */
export class UsageWindow {
  private buckets = new Map<string, number>();

  constructor(
    readonly granularity: Granularity,
    private readonly retentionMs: number,
  ) {}

  get(key: string): number {
    return this.buckets.get(key) ?? 0;
  }

  current(now: Date): number {
    return this.get(bucketKey(now, this.granularity));
  }

  add(now: Date, amount: number): number {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidInputError(`Usage must be a non-negative number, got ${amount}`);
    }
    const key = bucketKey(now, this.granularity);
    const total = this.get(key) + amount;
    this.buckets.set(key, total);
    return total;
  }

  /** Drop buckets at or before the one `retentionMs` ago. */
  evict(now: Date): number {
    const threshold = bucketKey(new Date(now.getTime() - this.retentionMs), this.granularity);
    let removed = 0;
    for (const key of [...this.buckets.keys()]) {
      if (key <= threshold) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.buckets.clear();
  }
}
