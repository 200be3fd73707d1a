/**
 * Central format module exports
 */

export { AbstractParser } from "./abstract-parser";
export {
  ANNOTATION_COLUMNS,
  type AnnotationColumn,
  AnnotationWriter,
} from "./annotation";
export { BedParser, BedWriter, validateCoordinates } from "./bed";
export {
  GTF_FIELD_COUNT,
  type GtfFeature,
  GtfGeneParser,
  GtfParser,
  geneFromGtfFeature,
  parseGtfAttributes,
  parseGtfLine,
  validateGtfStrand,
} from "./gtf";
