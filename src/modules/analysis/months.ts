/**
 * Month-Bucket Driver.
 *
 * Purpose: Split an explicit window into calendar-month buckets and run one
 * callback per bucket.
 *
 * Invariants:
 * - Bucket `i` ends where bucket `i + 1` starts; both ends are inclusive, so a
 *   record exactly on a boundary counts in both neighbours.
 * - Month steps keep the day of month and roll over short months
 *   (2021-01-31 -> 2021-03-03), so buckets are not all the same width.
 * - Callbacks run one at a time, in bucket order.
 */
import { addCalendarMonth } from "../../utils/dates";
import { UsageError } from "../../utils/errors";
import type { MonthBucket } from "./types";

export const BY_MONTH_REQUIRES_WINDOW = "by-month analysis requires an explicit window";

/**
 * Lists the buckets from `from` while the bucket start is before `to`. The last
 * bucket may end after `to`. `from >= to` gives no bucket.
 */
export function monthBuckets(from: Date | null, to: Date | null): MonthBucket[] {
  if (from === null || to === null) {
    throw new UsageError(BY_MONTH_REQUIRES_WINDOW);
  }

  const buckets: MonthBucket[] = [];
  for (let d = from; d < to; ) {
    const next = addCalendarMonth(d);
    buckets.push({ from: d, to: next });
    d = next;
  }
  return buckets;
}

/**
 * Invokes `callback` once per bucket of `[from, to]` for `tag`.
 *
 * Each callback is awaited before the next bucket starts; the returned array
 * follows bucket order.
 *
 * @throws UsageError when either bound is missing.
 */
export async function forEachMonth<T>(
  from: Date | null,
  to: Date | null,
  tag: string,
  callback: (bucket: MonthBucket, tag: string) => Promise<T> | T,
): Promise<T[]> {
  const results: T[] = [];
  for (const bucket of monthBuckets(from, to)) {
    results.push(await callback(bucket, tag));
  }
  return results;
}
