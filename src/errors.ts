/**
 * Error handling for peak interval processing
 *
 * Parsers and option validation raise these; the interval engine itself
 * degrades to empty results instead of throwing.
 */

/**
 * Base error class for all peakset errors
 */
export class PeaksetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PeaksetError";
  }

  /**
   * Render the message with line number and context when present
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed records and options
 */
export class ValidationError extends PeaksetError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PeaksetError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * BED-specific parsing errors carrying the offending region
 */
export class BedError extends ParseError {
  constructor(
    message: string,
    public readonly chromosome?: string,
    public readonly start?: number,
    public readonly end?: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "BED", lineNumber, context);
    this.name = "BedError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.chromosome !== undefined) {
      const region =
        this.start !== undefined && this.end !== undefined
          ? `${this.chromosome}:${this.start}-${this.end}`
          : this.chromosome;
      msg += `\nRegion: ${region}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing operation and path
 */
export class FileError extends PeaksetError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error from a platform `SystemError` or a host file system error
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `File path: ${filePath}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("notfound") || msg.includes("no such file")) {
      return "Check that the file path is correct";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    return undefined;
  }
}
