/**
 * peakset - genomic interval engine for ATAC/ChIP peak sets
 *
 * Merges peaks from many samples into a union set, finds overlaps between
 * interval lists and annotates peaks against a gene model.
 */

// Error types
export {
  BedError,
  FileError,
  ParseError,
  PeaksetError,
  ValidationError,
} from "./errors";
// Formats
export * from "./formats";
// File I/O
export { exists, FileReader, readLines, readToString } from "./io/file-reader";
export { FileWriter, writeString } from "./io/file-writer";
export { collect } from "./io/stream-utils";
// Interval engine
export * from "./operations";
// Core types
export type {
  AnnotateOptions,
  AnnotationRecord,
  AnnotationType,
  FeatureInterval,
  Gene,
  GeneAssignment,
  GeneInput,
  GeneStrand,
  GenomicInterval,
  IndexedInterval,
  Interval,
  OverlapPair,
  ParserOptions,
  Strand,
  UnionPeak,
  UnionPeakOptions,
} from "./types";
export { AnnotateOptionsSchema, GeneInputSchema, UnionPeakOptionsSchema } from "./types";
