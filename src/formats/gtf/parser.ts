/**
 * GTF parser and gene reader
 *
 * GTF rows are 1-based inclusive. `GtfParser` keeps them that way;
 * `GtfGeneParser` keeps only `gene` rows and converts them to 0-based
 * half-open `Gene` records (`start = start1 - 1`, `end = end1`).
 *
 * @module gtf/parser
 */

import { ParseError } from "../../errors";
import { createGene } from "../../operations/core/genes";
import type { Gene, ParserOptions, Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { GtfFeature } from "./types";
import { GTF_FIELD_COUNT } from "./types";

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse the GTF attribute column: `key "value"; key2 "value2";`
 *
 * Parts without a space separator are ignored, surrounding quotes are
 * stripped and a repeated key keeps its last value.
 *
 * @example
 * ```typescript
 * parseGtfAttributes('gene_id "ENSG001"; gene_name "TP53";');
 * // { gene_id: "ENSG001", gene_name: "TP53" }
 * ```
 *
 * @public
 */
export function parseGtfAttributes(attributeString: string): Record<string, string> {
  const attributes: Record<string, string> = {};

  for (const part of attributeString.split(";")) {
    const trimmed = part.trim();
    const separator = trimmed.indexOf(" ");
    if (separator === -1) continue;

    const key = trimmed.slice(0, separator);
    const value = trimmed
      .slice(separator + 1)
      .trim()
      .replace(/^"+|"+$/g, "");
    attributes[key] = value;
  }

  return attributes;
}

/**
 * @public
 */
export function validateGtfStrand(strand: string): strand is Strand {
  return strand === "+" || strand === "-" || strand === ".";
}

function parseOptionalNumber(
  value: string,
  field: string,
  lineNumber: number,
  parse: (raw: string) => number
): number | null {
  if (value === "." || value === "") {
    return null;
  }
  const parsed = parse(value);
  if (Number.isNaN(parsed)) {
    throw new ParseError(`Invalid ${field}: ${value}`, "GTF", lineNumber);
  }
  return parsed;
}

function parseGtfCoordinate(value: string, field: string, lineNumber: number): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new ParseError(
      `Invalid ${field} coordinate: '${value}' is not a positive integer`,
      "GTF",
      lineNumber
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse one tab-separated GTF row
 *
 * @throws {ParseError} If the row does not have 9 columns or has invalid
 *   coordinates, strand, score or frame
 *
 * @public
 */
export function parseGtfLine(line: string, lineNumber: number): GtfFeature {
  const fields = line.split("\t");
  const [seqname, source, feature, startStr, endStr, scoreStr, strandStr, frameStr, attributeStr] =
    fields;

  if (
    fields.length !== GTF_FIELD_COUNT ||
    seqname === undefined ||
    source === undefined ||
    feature === undefined ||
    startStr === undefined ||
    endStr === undefined ||
    scoreStr === undefined ||
    strandStr === undefined ||
    frameStr === undefined ||
    attributeStr === undefined
  ) {
    throw new ParseError(
      `GTF format requires exactly ${GTF_FIELD_COUNT} tab-separated fields, got ${fields.length}`,
      "GTF",
      lineNumber,
      "Each GTF line must have: seqname, source, feature, start, end, score, strand, frame, attributes"
    );
  }

  const start = parseGtfCoordinate(startStr, "start", lineNumber);
  const end = parseGtfCoordinate(endStr, "end", lineNumber);
  if (start < 1 || start > end) {
    throw new ParseError(
      `Invalid coordinates: start ${start}, end ${end}`,
      "GTF",
      lineNumber,
      "GTF uses 1-based inclusive coordinates"
    );
  }

  if (!validateGtfStrand(strandStr)) {
    throw new ParseError(
      `Invalid strand '${strandStr}', must be '+', '-', or '.'`,
      "GTF",
      lineNumber
    );
  }

  return {
    seqname,
    source,
    feature,
    start,
    end,
    score: parseOptionalNumber(scoreStr, "score", lineNumber, Number.parseFloat),
    strand: strandStr,
    frame: parseOptionalNumber(frameStr, "frame", lineNumber, (raw) => Number.parseInt(raw, 10)),
    attributes: parseGtfAttributes(attributeStr),
    lineNumber,
  };
}

/**
 * Convert a GTF gene row to a 0-based half-open `Gene`
 *
 * `geneName` falls back to `gene_id` when `gene_name` is missing or empty.
 *
 * @throws {ValidationError} If the row's strand is not `+` or `-`
 *
 * @public
 */
export function geneFromGtfFeature(feature: GtfFeature): Gene {
  return createGene(
    {
      chromosome: feature.seqname,
      start: feature.start - 1,
      end: feature.end,
      strand: feature.strand,
      geneId: feature.attributes.gene_id ?? "",
      geneName: feature.attributes.gene_name ?? "",
    },
    feature.lineNumber
  );
}

/**
 * Streaming GTF feature parser
 *
 * @example
 * ```typescript
 * const parser = new GtfParser();
 * for await (const feature of parser.parseString(gtfData)) {
 *   console.log(`${feature.seqname}:${feature.start}-${feature.end} (${feature.feature})`);
 * }
 * ```
 */
export class GtfParser extends AbstractParser<GtfFeature> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "GTF";
  }

  protected parseLine(line: string, lineNumber: number): GtfFeature {
    return parseGtfLine(line, lineNumber);
  }
}

/**
 * Gene model reader over GTF `gene` rows
 *
 * Rows with fewer than 9 columns and rows of other feature types are passed
 * over silently without further checks. Gene rows that fail to parse, and
 * gene rows without a transcription direction (strand `.`), are skipped with
 * a warning, or sent to `onError` when one was given.
 *
 * @example
 * ```typescript
 * const genes: Gene[] = [];
 * for await (const gene of new GtfGeneParser().parseFile("genes.gtf")) {
 *   genes.push(gene);
 * }
 * ```
 */
export class GtfGeneParser extends AbstractParser<Gene> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "GTF";
  }

  protected parseLine(line: string, lineNumber: number): Gene | null {
    const fields = line.split("\t");
    if (fields.length < GTF_FIELD_COUNT || fields[2] !== "gene") {
      return null;
    }

    let feature: GtfFeature;
    try {
      feature = parseGtfLine(line, lineNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      return this.skipLine(error, lineNumber);
    }

    if (feature.strand === ".") {
      const geneId = feature.attributes.gene_id ?? "";
      this.warn(`Skipping gene '${geneId}' without strand`, lineNumber);
      return null;
    }
    return geneFromGtfFeature(feature);
  }
}
