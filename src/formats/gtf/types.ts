/**
 * GTF format type definitions
 *
 * @module gtf/types
 */

import type { Strand } from "../../types";

/**
 * GTF feature row with parsed attributes
 *
 * @public
 */
export interface GtfFeature {
  /** Chromosome or sequence name (e.g., "chr1", "chrX") */
  readonly seqname: string;
  /** Annotation source (e.g., "HAVANA", "Ensembl") */
  readonly source: string;
  /** Feature type (e.g., "gene", "transcript", "exon") */
  readonly feature: string;
  /** Start coordinate (1-based inclusive) */
  readonly start: number;
  /** End coordinate (1-based inclusive) */
  readonly end: number;
  readonly score: number | null;
  readonly strand: Strand;
  /** Reading frame for CDS features (0, 1, 2) or null */
  readonly frame: number | null;
  readonly attributes: Readonly<Record<string, string>>;
  readonly lineNumber: number;
}

/**
 * Number of tab-separated columns in a GTF row
 */
export const GTF_FIELD_COUNT = 9;
