/**
 * Chromosome partitioning
 *
 * Groups interval-like records by chromosome and sorts each group by start.
 * Sorting is stable, so records with equal starts keep their input order;
 * the annotator's tie-break rules depend on that.
 *
 * @module operations/core/partition
 */

import type { GenomicInterval, IndexedInterval } from "../../types";

/**
 * Chromosome name to records sorted by start
 */
export type ChromosomeMap<T> = Map<string, T[]>;

/**
 * Chromosome names in ascending code-unit order
 */
export function sortedChromosomes(map: ReadonlyMap<string, unknown>): string[] {
  return [...map.keys()].sort();
}

function sortByStart<T extends { readonly start: number }>(grouped: Map<string, T[]>): void {
  for (const list of grouped.values()) {
    list.sort((a, b) => a.start - b.start);
  }
}

function withSortedKeys<T>(grouped: Map<string, T[]>): ChromosomeMap<T> {
  const ordered: ChromosomeMap<T> = new Map();
  for (const chromosome of sortedChromosomes(grouped)) {
    const list = grouped.get(chromosome);
    if (list !== undefined) ordered.set(chromosome, list);
  }
  return ordered;
}

/**
 * Group records by chromosome, each group sorted by start
 *
 * @example
 * ```typescript
 * const byChrom = partitionByChromosome(peaks);
 * for (const [chromosome, sorted] of byChrom) {
 *   console.log(chromosome, sorted.length);
 * }
 * ```
 */
export function partitionByChromosome<T extends GenomicInterval>(
  records: readonly T[]
): ChromosomeMap<T> {
  const grouped = new Map<string, T[]>();

  for (const record of records) {
    const list = grouped.get(record.chromosome);
    if (list) {
      list.push(record);
    } else {
      grouped.set(record.chromosome, [record]);
    }
  }

  sortByStart(grouped);
  return withSortedKeys(grouped);
}

/**
 * Group records by chromosome as `(start, end, index)` triples, where
 * `index` is the record's position in `records`
 */
export function partitionWithIndex(
  records: readonly GenomicInterval[]
): ChromosomeMap<IndexedInterval> {
  const grouped = new Map<string, IndexedInterval[]>();

  records.forEach((record, index) => {
    const entry: IndexedInterval = { start: record.start, end: record.end, index };
    const list = grouped.get(record.chromosome);
    if (list) {
      list.push(entry);
    } else {
      grouped.set(record.chromosome, [entry]);
    }
  });

  sortByStart(grouped);
  return withSortedKeys(grouped);
}
