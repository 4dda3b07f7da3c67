/**
 * Error handling for strandedness inference
 *
 * Every failure raised by the library derives from StrandcheckError so callers
 * can catch one type and still branch on `code`.
 */

/**
 * Base error class for all strandcheck errors
 */
export class StrandcheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "StrandcheckError";
  }

  /**
   * Create a user-friendly error message with context
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
 * Validation errors for malformed counts or options
 */
export class ValidationError extends StrandcheckError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends StrandcheckError {
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
 * SAM alignment line errors
 */
export class SamError extends ParseError {
  constructor(
    message: string,
    public readonly qname?: string,
    public readonly fieldName?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "SAM", lineNumber, context);
    this.name = "SamError";
  }
}

/**
 * Counts file errors
 */
export class CountsFormatError extends ParseError {
  constructor(
    message: string,
    lineNumber?: number,
    public readonly line?: string
  ) {
    super(message, "COUNTS", lineNumber, line);
    this.name = "CountsFormatError";
  }
}

/**
 * File I/O errors with the failing operation and the underlying system error
 */
export class FileError extends StrandcheckError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
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
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Lower the batch concurrency or increase system limits";
    }

    return undefined;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends StrandcheckError {
  constructor(
    message: string,
    public readonly streamType: "read" | "decompress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer overflow when a line never terminates
 */
export class BufferError extends StrandcheckError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

export const ERROR_SUGGESTIONS = {
  VALIDATION_ERROR: "Check that counts are non-negative integers and that forward + reverse does not exceed total",
  PARSE_ERROR: "Verify the input is aligner SAM output or a counts file written by strandcheck",
  FILE_ERROR: "Check that the file exists and is readable",
  STREAM_ERROR: "The input may be truncated or not valid gzip",
  BUFFER_ERROR: "The file may lack line endings or be binary (BAM needs converting to SAM first)",
} as const;

/**
 * Look up a remediation hint for an error
 */
export function getErrorSuggestion(error: StrandcheckError): string | undefined {
  const suggestions: Readonly<Record<string, string | undefined>> = ERROR_SUGGESTIONS;
  return suggestions[error.code];
}
