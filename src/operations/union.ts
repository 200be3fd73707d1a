/**
 * Union peak construction across samples
 *
 * Pools every sample's peaks per chromosome and merges them into one
 * non-overlapping peak set. Peaks that merely touch are merged too, so the
 * union covers exactly the union of the input coordinates. Optionally
 * reports, for each union peak, the samples with at least one peak that
 * strictly overlaps it.
 *
 * @module operations/union
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { GenomicInterval, UnionPeak, UnionPeakOptions } from "../types";
import { UnionPeakOptionsSchema } from "../types";
import { merge1d } from "./core/intervals";
import { sortedChromosomes } from "./core/partition";
import { sweepOverlaps } from "./overlap";

/**
 * Peaks keyed by sample identifier
 */
export type PeaksBySample =
  | ReadonlyMap<string, readonly GenomicInterval[]>
  | Readonly<Record<string, readonly GenomicInterval[]>>;

/**
 * Contributing samples per union peak, keyed by `membershipKey(peak)`
 */
export type PeakMembership = ReadonlyMap<string, readonly string[]>;

/**
 * Union peaks in chromosome order, then start order
 */
export interface UnionPeakSet {
  readonly peaks: UnionPeak[];
  /** Sorted, deduplicated samples per union peak; present only when requested */
  readonly membership?: PeakMembership;
}

export interface UnionPeakSetWithMembership extends UnionPeakSet {
  readonly membership: PeakMembership;
}

/**
 * Membership lookup key for a peak, `chrom:start-end`
 *
 * Any interval with the same coordinates finds the same entry, including one
 * read back from a saved BED file.
 */
export function membershipKey(peak: GenomicInterval): string {
  return `${peak.chromosome}:${peak.start}-${peak.end}`;
}

function isSampleMap(
  peaksBySample: PeaksBySample
): peaksBySample is ReadonlyMap<string, readonly GenomicInterval[]> {
  return peaksBySample instanceof Map;
}

function sampleEntries(peaksBySample: PeaksBySample): Array<[string, readonly GenomicInterval[]]> {
  if (isSampleMap(peaksBySample)) {
    return [...peaksBySample.entries()];
  }
  return Object.entries(peaksBySample);
}

function appendTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * Build union peaks across samples
 *
 * @example
 * ```typescript
 * const { peaks, membership } = unionPeaks(
 *   {
 *     sampleA: [{ chromosome: "chr1", start: 100, end: 180 }],
 *     sampleB: [{ chromosome: "chr1", start: 150, end: 220 }],
 *   },
 *   { membership: true }
 * );
 * // peaks: [{ chromosome: "chr1", start: 100, end: 220 }]
 * // membership.get("chr1:100-220"): ["sampleA", "sampleB"]
 * ```
 *
 * @throws {ValidationError} If options fail validation
 */
export function unionPeaks(
  peaksBySample: PeaksBySample,
  options: UnionPeakOptions & { membership: true }
): UnionPeakSetWithMembership;
export function unionPeaks(peaksBySample: PeaksBySample, options?: UnionPeakOptions): UnionPeakSet;
export function unionPeaks(peaksBySample: PeaksBySample, options: UnionPeakOptions = {}): UnionPeakSet {
  const validated = UnionPeakOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid union options: ${validated.summary}`);
  }
  const wantMembership = validated.membership ?? false;

  const pooled = new Map<string, GenomicInterval[]>();
  const bySample = new Map<string, Map<string, GenomicInterval[]>>();

  for (const [sample, peaks] of sampleEntries(peaksBySample)) {
    for (const peak of peaks) {
      appendTo(pooled, peak.chromosome, peak);
      if (wantMembership) {
        let samples = bySample.get(peak.chromosome);
        if (!samples) {
          samples = new Map();
          bySample.set(peak.chromosome, samples);
        }
        appendTo(samples, sample, peak);
      }
    }
  }

  const peaks: UnionPeak[] = [];
  const unionByChromosome = new Map<string, UnionPeak[]>();

  for (const chromosome of sortedChromosomes(pooled)) {
    const merged = merge1d(pooled.get(chromosome) ?? []).map(
      ({ start, end }): UnionPeak => ({ chromosome, start, end })
    );
    unionByChromosome.set(chromosome, merged);
    for (const peak of merged) {
      peaks.push(peak);
    }
  }

  if (!wantMembership) {
    return { peaks };
  }

  return { peaks, membership: buildMembership(peaks, unionByChromosome, bySample) };
}

/**
 * Sweep each sample's sorted peaks against its chromosome's union peaks and
 * record the sample on every union peak it strictly overlaps
 */
function buildMembership(
  peaks: readonly UnionPeak[],
  unionByChromosome: ReadonlyMap<string, readonly UnionPeak[]>,
  bySample: ReadonlyMap<string, ReadonlyMap<string, readonly GenomicInterval[]>>
): Map<string, readonly string[]> {
  const contributors = new Map<UnionPeak, Set<string>>();
  for (const peak of peaks) {
    contributors.set(peak, new Set());
  }

  for (const [chromosome, samples] of bySample) {
    const union = unionByChromosome.get(chromosome);
    if (union === undefined || union.length === 0) continue;

    for (const [sample, intervals] of samples) {
      const sorted = [...intervals].sort((a, b) => a.start - b.start);
      sweepOverlaps(sorted, union, (_interval, unionPeak) => {
        contributors.get(unionPeak)?.add(sample);
      });
    }
  }

  const membership = new Map<string, readonly string[]>();
  for (const [peak, samples] of contributors) {
    membership.set(membershipKey(peak), [...samples].sort());
  }
  return membership;
}
