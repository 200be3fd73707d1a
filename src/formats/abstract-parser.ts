/**
 * Abstract base parser for line-oriented annotation formats
 *
 * Owns the shared line loop: skipping blank and comment lines, line length
 * limits, AbortSignal checks and routing of errors and warnings. Each format
 * supplies its own `parseLine`.
 */

import { PeaksetError, ParseError } from "../errors";
import { readLines } from "../io/file-reader";
import type { ParserOptions } from "../types";

const DEFAULT_MAX_LINE_LENGTH = 1_000_000;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T> {
  protected readonly maxLineLength: number;
  private readonly signal: AbortSignal | undefined;
  private readonly onError: ((error: string, lineNumber?: number) => void) | undefined;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;

  constructor(options: ParserOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    this.signal = options.signal;
    this.onError = options.onError;
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      });
  }

  /**
   * Parse records from an in-memory string
   */
  async *parseString(data: string): AsyncIterable<T> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse records from a file, streaming it line by line
   */
  async *parseFile(filePath: string): AsyncIterable<T> {
    yield* this.parseLines(readLines(filePath));
  }

  /**
   * Parse records from any source of lines; line numbers start at 1
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<T> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted(lineNumber);

      if (line.length > this.maxLineLength) {
        this.reportError(
          new ParseError(
            `Line too long (${line.length} > ${this.maxLineLength})`,
            this.getFormatName(),
            lineNumber
          ),
          lineNumber
        );
        continue;
      }

      const trimmed = line.trim();
      if (trimmed === "" || this.isSkippable(trimmed)) continue;

      let record: T | null;
      try {
        record = this.parseLine(trimmed, lineNumber);
      } catch (error) {
        if (!(error instanceof PeaksetError)) throw error;
        this.reportError(error, lineNumber);
        continue;
      }

      if (record !== null) {
        yield record;
      }
    }
  }

  /**
   * Report a skipped, well-formed line
   */
  protected warn(warning: string, lineNumber: number): void {
    this.onWarning(warning, lineNumber);
  }

  /**
   * Pass over a line the format tolerates, such as a column header: routed
   * to `onError` when one was given, otherwise reported as a warning
   */
  protected skipLine(error: PeaksetError, lineNumber: number): null {
    if (this.onError === undefined) {
      this.onWarning(error.message, lineNumber);
    } else {
      this.onError(error.message, lineNumber);
    }
    return null;
  }

  /**
   * Hand a malformed line to `onError`, or throw when none was given
   */
  private reportError(error: PeaksetError, lineNumber: number): void {
    if (this.onError === undefined) {
      throw error;
    }
    this.onError(error.message, lineNumber);
  }

  private checkAborted(lineNumber: number): void {
    if (this.signal?.aborted) {
      throw new ParseError(
        `Operation aborted during ${this.getFormatName()} parsing`,
        "ABORTED",
        lineNumber
      );
    }
  }

  /**
   * True for header and comment lines the format ignores
   */
  protected isSkippable(trimmedLine: string): boolean {
    return trimmedLine.startsWith("#");
  }

  /**
   * Parse one non-empty line; `null` skips it
   *
   * @throws {ParseError} For malformed lines
   */
  protected abstract parseLine(line: string, lineNumber: number): T | null;

  /**
   * Format identifier for messages (e.g. "BED", "GTF")
   */
  protected abstract getFormatName(): string;
}
