/**
 * Gene record construction
 *
 * @module operations/core/genes
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { Gene, GeneInput } from "../../types";
import { GeneInputSchema } from "../../types";

/**
 * Validate raw gene fields and derive the TSS
 *
 * The TSS is the 0-based first transcribed base: `start` on the `+` strand,
 * `end - 1` on the `-` strand. An empty `geneName` falls back to `geneId`.
 *
 * @throws {ValidationError} If coordinates are not a non-empty half-open
 *   interval or the strand is not `+` or `-`
 *
 * @example
 * ```typescript
 * createGene({ chromosome: "chr1", start: 1000, end: 5000, strand: "-", geneId: "G1" }).tss;
 * // 4999
 * ```
 */
export function createGene(input: GeneInput, lineNumber?: number): Gene {
  const gene = GeneInputSchema(input);
  if (gene instanceof type.errors) {
    throw new ValidationError(
      `Invalid gene '${input.geneId}': ${gene.summary}`,
      lineNumber,
      `${input.chromosome}:${input.start}-${input.end} (${input.strand})`
    );
  }

  const tss = gene.strand === "+" ? gene.start : gene.end - 1;

  return {
    chromosome: gene.chromosome,
    start: gene.start,
    end: gene.end,
    strand: gene.strand,
    geneId: gene.geneId,
    geneName: gene.geneName !== undefined && gene.geneName !== "" ? gene.geneName : gene.geneId,
    tss,
  };
}
