/**
 * Interval engine operations
 *
 * @module operations
 */

export { intervalCenter, merge1d, overlaps } from "./core/intervals";
export {
  type ChromosomeMap,
  partitionByChromosome,
  partitionWithIndex,
  sortedChromosomes,
} from "./core/partition";
export { createGene } from "./core/genes";
export { findGenomicOverlaps, findOverlaps, sweepOverlaps } from "./overlap";
export {
  membershipKey,
  type PeakMembership,
  type PeaksBySample,
  type UnionPeakSet,
  type UnionPeakSetWithMembership,
  unionPeaks,
} from "./union";
export {
  annotatePeaks,
  buildPromoters,
  buildTssIndex,
  closestByTss,
  collectOverlaps,
  DEFAULT_PROMOTER_DOWNSTREAM,
  DEFAULT_PROMOTER_UPSTREAM,
  geneBodies,
  lowerBound,
  nearestTss,
  type TssIndex,
} from "./annotate";
export {
  type AnnotateBedFileOptions,
  annotateBedFile,
  readBedPeaks,
  readGtfGenes,
  unionBedFiles,
} from "./pipeline";
