/**
 * BED3 peak reader and writer
 *
 * Reads `chrom start end` peaks (0-based half-open); columns past the third
 * are ignored. Handles real-world peak files:
 * - track, browser and comment lines
 * - blank lines
 * - column headers and other lines with fewer than 3 fields or non-integer
 *   coordinates, which are skipped with a warning (or sent to `onError`)
 * - empty or inverted peaks (`end <= start`), which are skipped with a warning
 *
 * Negative coordinates are an error.
 */

import { BedError } from "../errors";
import { writeString } from "../io/file-writer";
import type { GenomicInterval, ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Validate BED coordinates before building a peak
 */
export function validateCoordinates(
  start: number,
  end: number
): { valid: true } | { valid: false; error: string } {
  if (start < 0 || end < 0) {
    return { valid: false, error: "Coordinates cannot be negative" };
  }
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    return { valid: false, error: "Coordinates exceed the safe integer range" };
  }
  return { valid: true };
}

/**
 * Streaming BED3 parser
 *
 * @example
 * ```typescript
 * const parser = new BedParser();
 * for await (const peak of parser.parseFile("sampleA.bed")) {
 *   console.log(`${peak.chromosome}:${peak.start}-${peak.end}`);
 * }
 * ```
 */
export class BedParser extends AbstractParser<GenomicInterval> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "BED";
  }

  protected override isSkippable(trimmedLine: string): boolean {
    return (
      trimmedLine.startsWith("#") ||
      trimmedLine.startsWith("track") ||
      trimmedLine.startsWith("browser")
    );
  }

  protected parseLine(line: string, lineNumber: number): GenomicInterval | null {
    const fields = line.split(/\s+/);
    const [chromosome, startStr, endStr] = fields;

    if (chromosome === undefined || startStr === undefined || endStr === undefined) {
      return this.skipLine(
        new BedError(
          `BED format requires at least 3 fields, got ${fields.length}`,
          chromosome,
          undefined,
          undefined,
          lineNumber,
          line
        ),
        lineNumber
      );
    }

    const start = this.parseCoordinate(startStr, "start", chromosome, lineNumber);
    if (start instanceof BedError) return this.skipLine(start, lineNumber);
    const end = this.parseCoordinate(endStr, "end", chromosome, lineNumber);
    if (end instanceof BedError) return this.skipLine(end, lineNumber);

    const validation = validateCoordinates(start, end);
    if (!validation.valid) {
      throw new BedError(validation.error, chromosome, start, end, lineNumber, line);
    }

    if (end <= start) {
      this.warn(`Skipping empty peak ${chromosome}:${start}-${end}`, lineNumber);
      return null;
    }

    return { chromosome, start, end };
  }

  private parseCoordinate(
    coordStr: string,
    fieldName: "start" | "end",
    chromosome: string,
    lineNumber: number
  ): number | BedError {
    if (!INTEGER_PATTERN.test(coordStr)) {
      return new BedError(
        `Invalid ${fieldName}: '${coordStr}' is not a valid integer`,
        chromosome,
        undefined,
        undefined,
        lineNumber,
        `Expected integer, got: ${coordStr}`
      );
    }
    return Number.parseInt(coordStr, 10);
  }
}

/**
 * BED3 writer, used to save union peak sets
 */
export class BedWriter {
  formatInterval(interval: GenomicInterval): string {
    return [interval.chromosome, interval.start.toString(), interval.end.toString()].join("\t");
  }

  /**
   * One line per interval, each newline-terminated
   */
  formatIntervals(intervals: readonly GenomicInterval[]): string {
    return intervals.map((interval) => `${this.formatInterval(interval)}\n`).join("");
  }

  async writeFile(path: string, intervals: readonly GenomicInterval[]): Promise<void> {
    await writeString(path, this.formatIntervals(intervals));
  }
}
