/**
 * GTF format module
 *
 * @module gtf
 */

export {
  GtfGeneParser,
  GtfParser,
  geneFromGtfFeature,
  parseGtfAttributes,
  parseGtfLine,
  validateGtfStrand,
} from "./parser";
export type { GtfFeature } from "./types";
export { GTF_FIELD_COUNT } from "./types";
