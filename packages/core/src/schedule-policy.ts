import type { BucketIndex } from "./domain.js";

/**
 * Target bucket per hour of day, index = hour.
 * Night is darkest, midday brightest, dusk steps down one bucket per hour.
 */
export const HOURLY_TARGET_BUCKETS: readonly BucketIndex[] = [
  0, 0, 0, 0, 0, // 00-04 night
  1, 1, //          05-06 pre-dawn
  2, 2, //          07-08 morning
  4, 4, 4, //       09-11
  5, 5, 5, 5, //    12-15 midday
  4, //             16
  3, //             17
  2, //             18
  1, //             19
  0, 0, 0, 0, //    20-23
];

export function normalizeHour(hour: number): number {
  const whole = Math.trunc(hour);
  return ((whole % 24) + 24) % 24;
}

export function targetBucketForHour(hour: number): BucketIndex {
  return HOURLY_TARGET_BUCKETS[normalizeHour(hour)] ?? 0;
}
