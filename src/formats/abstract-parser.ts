/**
 * Abstract base parser with shared option handling and interrupt support
 *
 * Gives the SAM and counts parsers one way to merge defaults, report
 * problems and honour an AbortSignal, while each keeps its own line logic.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<Omit<ParserOptions, "signal">>;

  constructor(options: TOptions) {
    // Merge in order: base -> format-specific -> user options
    const baseDefaults: Required<Omit<ParserOptions, "signal">> = {
      skipInvalid: false,
      maxLineLength: 1_000_000,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<ParserOptions>;

  /**
   * Format name for error messages and logging (e.g. "SAM")
   */
  protected abstract getFormatName(): string;

  /**
   * Check if parsing should stop; call inside parsing loops
   * @throws {ParseError} If the signal was aborted
   */
  protected throwIfAborted(context: string): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Route a malformed line to onWarning (skipInvalid) or onError
   */
  protected reportInvalid(message: string, lineNumber: number): void {
    if (this.options.skipInvalid) {
      this.options.onWarning(`${message}; line skipped`, lineNumber);
    } else {
      this.options.onError(message, lineNumber);
    }
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, decompressing `.gz` inputs
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;
}
