/**
 * Peak annotation against a gene model
 *
 * Each peak is classified in strict priority order:
 *
 * 1. `promoter` - strictly overlaps at least one promoter window
 * 2. `gene_body` - otherwise strictly overlaps at least one gene span
 * 3. `intergenic` - otherwise; the gene is the one with the nearest TSS
 *
 * Within the first two classes the assigned gene is the overlapping feature
 * whose TSS is closest to the peak center. On equal distance the first
 * candidate in chromosome-sorted feature order wins. Distances are signed,
 * `center - tss`, with `center = floor((start + end) / 2)`.
 *
 * @module operations/annotate
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type {
  AnnotateOptions,
  AnnotationRecord,
  AnnotationType,
  FeatureInterval,
  Gene,
  GeneAssignment,
  GenomicInterval,
} from "../types";
import { AnnotateOptionsSchema } from "../types";
import { intervalCenter, overlaps } from "./core/intervals";
import { type ChromosomeMap, partitionByChromosome, partitionWithIndex } from "./core/partition";

export const DEFAULT_PROMOTER_UPSTREAM = 2000;
export const DEFAULT_PROMOTER_DOWNSTREAM = 200;

const NO_GENE: GeneAssignment = { gene: "", distance: 0 };

/**
 * Sorted TSS positions of one chromosome with gene names aligned by index
 */
export interface TssIndex {
  readonly positions: readonly number[];
  readonly names: readonly string[];
}

/**
 * Promoter windows around each gene's TSS
 *
 * Upstream and downstream follow the direction of transcription, so they
 * swap on the `-` strand. Windows are clamped at 0 and dropped when empty.
 */
export function buildPromoters(
  genes: readonly Gene[],
  upstream: number,
  downstream: number
): FeatureInterval[] {
  const promoters: FeatureInterval[] = [];

  for (const gene of genes) {
    const [start, end] =
      gene.strand === "+"
        ? [Math.max(0, gene.tss - upstream), gene.tss + downstream]
        : [Math.max(0, gene.tss - downstream), gene.tss + upstream];

    if (end > start) {
      promoters.push({
        chromosome: gene.chromosome,
        start,
        end,
        geneName: gene.geneName,
        tss: gene.tss,
      });
    }
  }

  return promoters;
}

/**
 * Gene spans as annotatable features
 */
export function geneBodies(genes: readonly Gene[]): FeatureInterval[] {
  return genes.map((gene) => ({
    chromosome: gene.chromosome,
    start: gene.start,
    end: gene.end,
    geneName: gene.geneName,
    tss: gene.tss,
  }));
}

/**
 * Overlapping features per peak, keyed by the peak's input index
 *
 * Peaks are walked in start order per chromosome with one shared feature
 * pointer: features ending at or before the peak start are passed for good,
 * then every feature starting before the peak end is tested.
 */
export function collectOverlaps(
  peaks: readonly GenomicInterval[],
  featuresByChromosome: ChromosomeMap<FeatureInterval>
): Map<number, FeatureInterval[]> {
  const hits = new Map<number, FeatureInterval[]>();

  for (const [chromosome, sortedPeaks] of partitionWithIndex(peaks)) {
    const features = featuresByChromosome.get(chromosome);
    if (features === undefined) continue;

    let j = 0;
    for (const peak of sortedPeaks) {
      while (j < features.length && features[j]!.end <= peak.start) {
        j++;
      }

      const candidates: FeatureInterval[] = [];
      for (let k = j; k < features.length && features[k]!.start < peak.end; k++) {
        const feature = features[k]!;
        if (overlaps(peak, feature)) {
          candidates.push(feature);
        }
      }

      if (candidates.length > 0) {
        hits.set(peak.index, candidates);
      }
    }
  }

  return hits;
}

/**
 * Candidate whose TSS is closest to `center`; the first one wins ties
 */
export function closestByTss(
  center: number,
  candidates: readonly FeatureInterval[]
): GeneAssignment {
  let best = NO_GENE;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const signed = center - candidate.tss;
    if (Math.abs(signed) < bestDistance) {
      bestDistance = Math.abs(signed);
      best = { gene: candidate.geneName, distance: signed };
    }
  }

  return best;
}

/**
 * Per-chromosome TSS index for nearest-gene lookups
 */
export function buildTssIndex(genes: readonly Gene[]): Map<string, TssIndex> {
  const grouped = new Map<string, Array<{ tss: number; name: string }>>();

  for (const gene of genes) {
    const entry = { tss: gene.tss, name: gene.geneName };
    const list = grouped.get(gene.chromosome);
    if (list) {
      list.push(entry);
    } else {
      grouped.set(gene.chromosome, [entry]);
    }
  }

  const index = new Map<string, TssIndex>();
  for (const [chromosome, entries] of grouped) {
    entries.sort((a, b) => a.tss - b.tss);
    index.set(chromosome, {
      positions: entries.map((entry) => entry.tss),
      names: entries.map((entry) => entry.name),
    });
  }
  return index;
}

/**
 * First index whose value is not less than `value`
 */
export function lowerBound(sorted: readonly number[], value: number): number {
  let low = 0;
  let high = sorted.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid]! < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Gene with the TSS nearest to `position`
 *
 * Compares the TSS just before the insertion point with the one at it; the
 * earlier (smaller coordinate) TSS wins ties.
 */
export function nearestTss(index: TssIndex | undefined, position: number): GeneAssignment {
  if (index === undefined || index.positions.length === 0) {
    return NO_GENE;
  }

  const k = lowerBound(index.positions, position);
  let best = NO_GENE;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const candidate of [k - 1, k]) {
    const tss = index.positions[candidate];
    const name = index.names[candidate];
    if (tss === undefined || name === undefined) continue;

    const signed = position - tss;
    if (Math.abs(signed) < bestDistance) {
      bestDistance = Math.abs(signed);
      best = { gene: name, distance: signed };
    }
  }

  return best;
}

/**
 * Annotate peaks as promoter, gene body or intergenic
 *
 * Returns one record per peak, in input order, with `peakId` `peak_<index>`.
 *
 * @throws {ValidationError} If promoter options are not non-negative integers
 *
 * @example
 * ```typescript
 * const gene = createGene({ chromosome: "chr1", start: 150, end: 900, strand: "+", geneId: "G1" });
 * annotatePeaks([{ chromosome: "chr1", start: 100, end: 180 }], [gene]);
 * // [{ peakId: "peak_0", annotation: "promoter", gene: "G1", distanceToTss: -10, ... }]
 * ```
 */
export function annotatePeaks(
  peaks: readonly GenomicInterval[],
  genes: readonly Gene[],
  options: AnnotateOptions = {}
): AnnotationRecord[] {
  const validated = AnnotateOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid annotation options: ${validated.summary}`);
  }
  const upstream = validated.promoterUpstream ?? DEFAULT_PROMOTER_UPSTREAM;
  const downstream = validated.promoterDownstream ?? DEFAULT_PROMOTER_DOWNSTREAM;

  const promoterHits = collectOverlaps(
    peaks,
    partitionByChromosome(buildPromoters(genes, upstream, downstream))
  );
  const bodyHits = collectOverlaps(peaks, partitionByChromosome(geneBodies(genes)));
  const tssIndex = buildTssIndex(genes);

  return peaks.map((peak, index): AnnotationRecord => {
    const center = intervalCenter(peak);
    const promoters = promoterHits.get(index);
    const bodies = bodyHits.get(index);

    let annotation: AnnotationType;
    let assignment: GeneAssignment;
    if (promoters !== undefined) {
      annotation = "promoter";
      assignment = closestByTss(center, promoters);
    } else if (bodies !== undefined) {
      annotation = "gene_body";
      assignment = closestByTss(center, bodies);
    } else {
      annotation = "intergenic";
      assignment = nearestTss(tssIndex.get(peak.chromosome), center);
    }

    return {
      peakId: `peak_${index}`,
      chromosome: peak.chromosome,
      start: peak.start,
      end: peak.end,
      annotation,
      gene: assignment.gene,
      distanceToTss: assignment.distance,
    };
  });
}
