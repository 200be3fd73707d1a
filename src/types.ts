/**
 * Core type definitions for genomic intervals, genes and annotations
 *
 * All coordinates are 0-based half-open `[start, end)`. Records are
 * readonly values; the engine never mutates what it is given.
 */

import { type } from "arktype";

/**
 * Strand orientation as written in BED and GTF files
 */
export type Strand = "+" | "-" | ".";

/**
 * Strand of a gene that has a defined transcription direction
 */
export type GeneStrand = "+" | "-";

/**
 * Half-open 1D interval
 */
export interface Interval {
  readonly start: number;
  readonly end: number;
}

/**
 * Interval scoped to a chromosome or contig. Intervals on different
 * chromosomes are never compared.
 */
export interface GenomicInterval extends Interval {
  readonly chromosome: string;
}

/**
 * Interval paired with its position in the caller's input, so results can
 * be mapped back after sorting.
 */
export interface IndexedInterval extends Interval {
  readonly index: number;
}

/**
 * Merged peak covering the combined footprint of every sample's peaks in
 * one region. Sample provenance is kept outside, in the membership map.
 */
export type UnionPeak = GenomicInterval;

/**
 * Gene model record
 */
export interface Gene extends GenomicInterval {
  readonly strand: GeneStrand;
  readonly geneId: string;
  readonly geneName: string;
  /** 0-based TSS: `start` on `+`, `end - 1` on `-` */
  readonly tss: number;
}

/**
 * Annotatable region derived from a gene: a promoter window or the gene body
 */
export interface FeatureInterval extends GenomicInterval {
  readonly geneName: string;
  readonly tss: number;
}

/**
 * Peak classification, in priority order
 */
export type AnnotationType = "promoter" | "gene_body" | "intergenic";

/**
 * One annotation row per input peak
 */
export interface AnnotationRecord {
  readonly peakId: string;
  readonly chromosome: string;
  readonly start: number;
  readonly end: number;
  readonly annotation: AnnotationType;
  /** Assigned gene name, empty when the chromosome has no genes */
  readonly gene: string;
  /** Peak center minus TSS */
  readonly distanceToTss: number;
}

/**
 * Gene chosen for a peak together with its signed TSS distance
 */
export interface GeneAssignment {
  readonly gene: string;
  readonly distance: number;
}

/**
 * Index pair `[i, j]` meaning `a[i]` overlaps `b[j]`
 */
export type OverlapPair = readonly [number, number];

/**
 * Common parser options
 */
export interface ParserOptions {
  /** Lines longer than this are reported through `onError` */
  maxLineLength?: number;
  /** Aborts parsing between lines */
  signal?: AbortSignal;
  /** Called for malformed lines; the default throws */
  onError?: (error: string, lineNumber?: number) => void;
  /** Called for skipped but well-formed lines; the default logs */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Raw gene fields accepted by `createGene`
 */
export interface GeneInput {
  chromosome: string;
  start: number;
  end: number;
  strand: string;
  geneId: string;
  geneName?: string;
}

export const GeneInputSchema = type({
  chromosome: "string>0",
  start: "number>=0",
  end: "number>0",
  strand: "'+' | '-'",
  geneId: "string",
  "geneName?": "string",
}).narrow((gene, ctx) => {
  if (!Number.isInteger(gene.start) || !Number.isInteger(gene.end)) {
    return ctx.reject({
      expected: "integer coordinates",
      actual: `start=${gene.start}, end=${gene.end}`,
    });
  }
  if (gene.end <= gene.start) {
    return ctx.reject({
      expected: "end > start",
      actual: `start=${gene.start}, end=${gene.end}`,
    });
  }
  return true;
});

/**
 * Promoter window configuration for `annotatePeaks`
 */
export interface AnnotateOptions {
  /** Bases upstream of the TSS, relative to transcription (default 2000) */
  promoterUpstream?: number;
  /** Bases downstream of the TSS, relative to transcription (default 200) */
  promoterDownstream?: number;
}

export const AnnotateOptionsSchema = type({
  "promoterUpstream?": "number>=0",
  "promoterDownstream?": "number>=0",
}).narrow((options, ctx) => {
  for (const [name, value] of Object.entries(options)) {
    if (value !== undefined && !Number.isInteger(value)) {
      return ctx.reject({
        expected: `integer ${name}`,
        actual: String(value),
      });
    }
  }
  return true;
});

/**
 * Options for `unionPeaks`
 */
export interface UnionPeakOptions {
  /** Also report which samples overlap each union peak */
  membership?: boolean;
}

export const UnionPeakOptionsSchema = type({
  "membership?": "boolean",
});
