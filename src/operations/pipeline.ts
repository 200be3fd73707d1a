/**
 * File-to-file workflows
 *
 * Glue between the readers, the interval engine and the writers: read
 * per-sample BED3 peaks into a union set, or annotate a BED3 peak file
 * against a GTF gene model and save the TSV.
 *
 * @module operations/pipeline
 */

import { AnnotationWriter } from "../formats/annotation";
import { BedParser } from "../formats/bed";
import { GtfGeneParser } from "../formats/gtf";
import { collect } from "../io/stream-utils";
import type {
  AnnotateOptions,
  AnnotationRecord,
  Gene,
  GenomicInterval,
  ParserOptions,
  UnionPeakOptions,
} from "../types";
import { annotatePeaks } from "./annotate";
import { type UnionPeakSet, unionPeaks } from "./union";

export interface AnnotateBedFileOptions extends AnnotateOptions {
  /** BED3 peak file */
  peaksBed: string;
  /** GTF file with `gene` rows */
  gtf: string;
  /** Where to write the TSV; nothing is written when omitted */
  outTsv?: string;
  /** Options passed to both parsers */
  parser?: ParserOptions;
}

/**
 * Read every peak from a BED3 file
 */
export async function readBedPeaks(
  path: string,
  options: ParserOptions = {}
): Promise<GenomicInterval[]> {
  return collect(new BedParser(options).parseFile(path));
}

/**
 * Read every gene from a GTF file
 */
export async function readGtfGenes(path: string, options: ParserOptions = {}): Promise<Gene[]> {
  return collect(new GtfGeneParser(options).parseFile(path));
}

/**
 * Build union peaks from one BED3 file per sample
 *
 * @param samples - Sample identifier to BED3 path
 */
export async function unionBedFiles(
  samples: Readonly<Record<string, string>>,
  options: UnionPeakOptions & { parser?: ParserOptions } = {}
): Promise<UnionPeakSet> {
  const peaksBySample = new Map<string, GenomicInterval[]>();
  for (const [sample, path] of Object.entries(samples)) {
    peaksBySample.set(sample, await readBedPeaks(path, options.parser));
  }
  return unionPeaks(peaksBySample, { membership: options.membership ?? false });
}

/**
 * Annotate a BED3 peak file against a GTF gene model
 *
 * @example
 * ```typescript
 * const records = await annotateBedFile({
 *   peaksBed: "union.bed",
 *   gtf: "genes.gtf",
 *   outTsv: "union.annotated.tsv",
 * });
 * ```
 */
export async function annotateBedFile(options: AnnotateBedFileOptions): Promise<AnnotationRecord[]> {
  const peaks = await readBedPeaks(options.peaksBed, options.parser);
  const genes = await readGtfGenes(options.gtf, options.parser);

  const records = annotatePeaks(peaks, genes, {
    ...(options.promoterUpstream !== undefined && { promoterUpstream: options.promoterUpstream }),
    ...(options.promoterDownstream !== undefined && {
      promoterDownstream: options.promoterDownstream,
    }),
  });

  if (options.outTsv !== undefined) {
    await new AnnotationWriter().writeFile(options.outTsv, records);
  }
  return records;
}
