/**
 * Half-open interval primitives
 *
 * The overlap test and the merge fold deliberately disagree at boundaries:
 * `overlaps` requires at least one shared base (touching intervals do not
 * overlap), while `merge1d` joins intervals that merely touch. Callers must
 * not assume the two predicates agree when `a.end === b.start`.
 *
 * @module operations/core/intervals
 */

import type { Interval } from "../../types";

/**
 * True when `[a.start, a.end)` and `[b.start, b.end)` share at least one base
 *
 * @example
 * ```typescript
 * overlaps({ start: 100, end: 180 }, { start: 150, end: 220 }); // true
 * overlaps({ start: 100, end: 150 }, { start: 150, end: 220 }); // false
 * ```
 */
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Merge overlapping or touching intervals
 *
 * Sorts a copy by start (stable on ties), then folds left: an interval joins
 * the last merged one when `cur.start <= last.end`. The input is left as is.
 *
 * @example
 * ```typescript
 * merge1d([
 *   { start: 100, end: 180 },
 *   { start: 150, end: 220 },
 *   { start: 300, end: 330 },
 *   { start: 320, end: 350 },
 * ]);
 * // [{ start: 100, end: 220 }, { start: 300, end: 350 }]
 * ```
 */
export function merge1d(intervals: readonly Interval[]): Interval[] {
  const sorted = [...intervals].sort((a, b) => a.start - b.start);
  const merged: Array<{ start: number; end: number }> = [];

  for (const current of sorted) {
    const last = merged[merged.length - 1];
    if (last !== undefined && current.start <= last.end) {
      last.end = Math.max(last.end, current.end);
    } else {
      merged.push({ start: current.start, end: current.end });
    }
  }

  return merged;
}

/**
 * Floor of the interval midpoint
 */
export function intervalCenter(interval: Interval): number {
  return Math.floor((interval.start + interval.end) / 2);
}
