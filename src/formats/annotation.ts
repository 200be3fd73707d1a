/**
 * Annotation TSV writer
 *
 * Fixed column order, tab separated, one newline-terminated row per record
 * after a header row.
 */

import { writeString } from "../io/file-writer";
import type { AnnotationRecord } from "../types";

export const ANNOTATION_COLUMNS = [
  "peak_id",
  "chrom",
  "start",
  "end",
  "annotation",
  "gene",
  "distance_to_TSS",
] as const;

export type AnnotationColumn = (typeof ANNOTATION_COLUMNS)[number];

function fieldValue(record: AnnotationRecord, column: AnnotationColumn): string {
  switch (column) {
    case "peak_id":
      return record.peakId;
    case "chrom":
      return record.chromosome;
    case "start":
      return record.start.toString();
    case "end":
      return record.end.toString();
    case "annotation":
      return record.annotation;
    case "gene":
      return record.gene;
    case "distance_to_TSS":
      return record.distanceToTss.toString();
  }
}

/**
 * Writer for per-peak annotation tables
 *
 * @example
 * ```typescript
 * const writer = new AnnotationWriter();
 * await writer.writeFile("annotated.tsv", annotatePeaks(peaks, genes));
 * ```
 */
export class AnnotationWriter {
  formatHeader(): string {
    return ANNOTATION_COLUMNS.join("\t");
  }

  formatRecord(record: AnnotationRecord): string {
    return ANNOTATION_COLUMNS.map((column) => fieldValue(record, column)).join("\t");
  }

  /**
   * Header plus every record, each line newline-terminated
   */
  formatAll(records: readonly AnnotationRecord[]): string {
    const lines = [this.formatHeader(), ...records.map((record) => this.formatRecord(record))];
    return lines.map((line) => `${line}\n`).join("");
  }

  async writeFile(path: string, records: readonly AnnotationRecord[]): Promise<void> {
    await writeString(path, this.formatAll(records));
  }
}
