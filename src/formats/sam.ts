/**
 * SAM alignment reader
 *
 * Streams the alignment section of aligner output and extracts only what
 * strand counting needs: QNAME, FLAG and MAPQ. Header lines (@HD, @SQ, @PG,
 * ...) are skipped. Lines are never reordered, so block boundaries in
 * incremental counting fall on the same reads as in the file.
 */

import { type, type ArkErrors } from "arktype";
import { SamError } from "../errors";
import { readLines } from "../io/stream-utils";
import type { AlignmentRecord, FileReaderOptions, ParserOptions } from "../types";
import { MAPQScoreSchema, SAMFlagSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

/** Mandatory tab-separated fields of an alignment line */
const SAM_MANDATORY_FIELDS = 11;

/**
 * Streaming SAM parser yielding one AlignmentRecord per alignment line
 *
 * @example Basic usage
 * ```typescript
 * const parser = new SAMParser();
 * for await (const record of parser.parseFile('/path/to/sample.sam')) {
 *   console.log(`${record.qname}: flag ${record.flag}, mapq ${record.mapq}`);
 * }
 * ```
 *
 * @example Tolerating damaged lines
 * ```typescript
 * const parser = new SAMParser({
 *   skipInvalid: true,
 *   onWarning: (warning, lineNumber) => console.error(`Line ${lineNumber}: ${warning}`),
 * });
 * ```
 */
class SAMParser extends AbstractParser<AlignmentRecord> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      maxLineLength: 10_000_000, // long reads carry long SEQ/QUAL fields
      onError: (error: string, lineNumber?: number): void => {
        throw new SamError(error, undefined, undefined, lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`SAM Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "SAM";
  }

  /**
   * Parse alignment records from a string
   * @throws {SamError} When an alignment line is malformed
   */
  override async *parseString(data: string): AsyncIterable<AlignmentRecord> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse alignment records from a byte stream
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<AlignmentRecord> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse alignment records from a SAM file (plain or `.gz`)
   * @throws {FileError} When the file cannot be opened
   * @throws {SamError} When an alignment line is malformed
   */
  override async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<AlignmentRecord> {
    const { createStream } = await import("../io/file-reader");
    const stream = await createStream(filePath, options);
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<AlignmentRecord> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % 100_000 === 0) {
        this.throwIfAborted("alignment parsing");
      }

      if (line.length === 0 || line.startsWith("@")) continue;

      if (line.length > this.options.maxLineLength) {
        this.reportInvalid(`Line too long (${line.length} > ${this.options.maxLineLength})`, lineNumber);
        continue;
      }

      const record = this.parseAlignment(line, lineNumber);
      if (record !== undefined) {
        yield record;
      }
    }
  }

  /**
   * Extract QNAME, FLAG and MAPQ from one alignment line
   */
  private parseAlignment(line: string, lineNumber: number): AlignmentRecord | undefined {
    const fields = line.split("\t");
    if (fields.length < SAM_MANDATORY_FIELDS) {
      this.reportInvalid(
        `Alignment line has ${fields.length} fields, expected at least ${SAM_MANDATORY_FIELDS}`,
        lineNumber
      );
      return undefined;
    }

    const [qname = "", flagField = "", , , mapqField = ""] = fields;
    const flag = this.parseIntegerField(flagField, SAMFlagSchema, "FLAG", lineNumber);
    const mapq = this.parseIntegerField(mapqField, MAPQScoreSchema, "MAPQ", lineNumber);
    if (flag === undefined || mapq === undefined) {
      return undefined;
    }

    return { qname, flag, mapq, lineNumber };
  }

  private parseIntegerField(
    value: string,
    schema: (data: unknown) => number | ArkErrors,
    fieldName: "FLAG" | "MAPQ",
    lineNumber: number
  ): number | undefined {
    if (!/^\d+$/.test(value)) {
      this.reportInvalid(`Invalid ${fieldName}: not a number: ${value}`, lineNumber);
      return undefined;
    }

    const result = schema(Number.parseInt(value, 10));
    if (result instanceof type.errors) {
      this.reportInvalid(`Invalid ${fieldName}: ${result.summary}`, lineNumber);
      return undefined;
    }
    return result;
  }
}

export { SAMParser };
