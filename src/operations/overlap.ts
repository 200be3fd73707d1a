/**
 * Pairwise overlap sweep
 *
 * Two-pointer sweep over two start-sorted interval lists: test the heads,
 * report a hit, then drop whichever head ends first (the left head on ties).
 * Runs in O(|A| + |B|) once both lists are sorted. Every pair is tested at
 * most once, so reported pairs are unique.
 *
 * A head is dropped as soon as its end is the smaller one, so every
 * overlapping pair is found when each list is internally non-overlapping
 * (merged peaks, union peaks, tiled windows). Lists with nested intervals
 * can lose pairs.
 *
 * @module operations/overlap
 */

import type { GenomicInterval, Interval, OverlapPair } from "../types";
import { overlaps } from "./core/intervals";
import { partitionWithIndex } from "./core/partition";

/**
 * Run the sweep, calling `onHit(i, j)` for each overlapping head pair
 */
export function sweepOverlaps<A extends Interval, B extends Interval>(
  a: readonly A[],
  b: readonly B[],
  onHit: (left: A, right: B, i: number, j: number) => void
): void {
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const left = a[i]!;
    const right = b[j]!;

    if (overlaps(left, right)) {
      onHit(left, right, i, j);
    }

    if (left.end <= right.end) {
      i++;
    } else {
      j++;
    }
  }
}

/**
 * Overlapping index pairs between two start-sorted lists
 *
 * @example
 * ```typescript
 * findOverlaps(
 *   [{ start: 100, end: 180 }, { start: 300, end: 330 }],
 *   [{ start: 160, end: 200 }, { start: 310, end: 360 }]
 * );
 * // [[0, 0], [1, 1]]
 * ```
 */
export function findOverlaps(sortedA: readonly Interval[], sortedB: readonly Interval[]): OverlapPair[] {
  const pairs: OverlapPair[] = [];
  sweepOverlaps(sortedA, sortedB, (_left, _right, i, j) => {
    pairs.push([i, j]);
  });
  return pairs;
}

/**
 * Overlapping index pairs between two genomic interval lists
 *
 * Inputs need not be sorted. Each chromosome present in both lists is swept
 * on its own, in sorted chromosome order, and pairs refer to positions in
 * the original `a` and `b`.
 */
export function findGenomicOverlaps(
  a: readonly GenomicInterval[],
  b: readonly GenomicInterval[]
): OverlapPair[] {
  const groupedA = partitionWithIndex(a);
  const groupedB = partitionWithIndex(b);
  const pairs: OverlapPair[] = [];

  for (const [chromosome, listA] of groupedA) {
    const listB = groupedB.get(chromosome);
    if (listB === undefined) continue;

    sweepOverlaps(listA, listB, (left, right) => {
      pairs.push([left.index, right.index]);
    });
  }

  return pairs;
}
