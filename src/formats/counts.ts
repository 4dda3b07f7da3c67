/**
 * Counts file reader and writer
 *
 * A counts file holds one CountSnapshot per line, whitespace separated:
 *
 * ```
 * total fwd rev unmapped secondary supplementary [lowQuality] [label] [source]
 * 4000000 3117 37696 3959187 0 0 0 sample_1.fq.gz
 * 1000000 781 9424 989795 0 0 1M sample_1.fq.gz
 * ```
 *
 * Rows from the block-wise counter have no lowQuality column; a seventh
 * integer is read as lowQuality and its absence as 0.
 */

import { CountsFormatError } from "../errors";
import { readLines } from "../io/stream-utils";
import type { CountSnapshot, FileReaderOptions, ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

const INTEGER = /^\d+$/;
// "4M", "500K", "1.5M_partial", "2500_partial"; a bare number is not a label
const BLOCK_LABEL = /^\d+(\.\d+)?([KM](_partial)?|_partial)$/;
const REQUIRED_INTEGERS = 6;

/**
 * Streaming counts-file parser
 *
 * @example
 * ```typescript
 * const parser = new CountsParser();
 * for await (const snapshot of parser.parseFile("sample.counts.txt")) {
 *   console.log(classifyStrandedness(snapshot).strandedness);
 * }
 * ```
 */
export class CountsParser extends AbstractParser<CountSnapshot> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      onError: (error: string, lineNumber?: number): void => {
        throw new CountsFormatError(error, lineNumber);
      },
    };
  }

  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "Counts";
  }

  override async *parseString(data: string): AsyncIterable<CountSnapshot> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<CountSnapshot> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * @throws {FileError} When the file cannot be opened
   * @throws {CountsFormatError} When a line is malformed
   */
  override async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<CountSnapshot> {
    const { createStream } = await import("../io/file-reader");
    const stream = await createStream(filePath, options);
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<CountSnapshot> {
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      this.throwIfAborted("counts parsing");

      const trimmed = line.trim();
      if (trimmed.length === 0) continue;

      if (trimmed.length > this.options.maxLineLength) {
        this.reportInvalid(`Line too long (${trimmed.length} > ${this.options.maxLineLength})`, lineNumber);
        continue;
      }

      const snapshot = this.parseLine(trimmed, lineNumber);
      if (snapshot !== undefined) {
        yield snapshot;
      }
    }
  }

  private parseLine(line: string, lineNumber: number): CountSnapshot | undefined {
    const tokens = line.split(/\s+/);

    const leading: number[] = [];
    for (const token of tokens) {
      if (!INTEGER.test(token) || leading.length === REQUIRED_INTEGERS + 1) break;
      leading.push(Number.parseInt(token, 10));
    }

    const [total, forward, reverse, unmapped, secondary, supplementary, lowQuality = 0] = leading;
    if (
      total === undefined ||
      forward === undefined ||
      reverse === undefined ||
      unmapped === undefined ||
      secondary === undefined ||
      supplementary === undefined
    ) {
      this.reportInvalid(
        `Expected at least ${REQUIRED_INTEGERS} integer columns, found ${leading.length}`,
        lineNumber
      );
      return undefined;
    }

    const { label, source } = splitTrailingTokens(tokens.slice(leading.length));
    return {
      total,
      forward,
      reverse,
      unmapped,
      secondary,
      supplementary,
      lowQuality,
      ...(label !== undefined && { label }),
      ...(source !== undefined && { source }),
    };
  }
}

/**
 * Two or more trailing tokens are label then source; a single token is a
 * label when it carries a K/M suffix or "_partial", else a source. A bare
 * numeric block label therefore reads back as a label only when a source
 * follows it.
 */
function splitTrailingTokens(tokens: string[]): { label?: string; source?: string } {
  const [first, ...rest] = tokens;
  if (first === undefined) return {};
  if (rest.length > 0) return { label: first, source: rest.join(" ") };
  return BLOCK_LABEL.test(first) ? { label: first } : { source: first };
}

/**
 * Format one snapshot as a counts-file line (no trailing newline)
 */
export function formatCountsLine(snapshot: CountSnapshot): string {
  const fields: Array<string | number> = [
    snapshot.total,
    snapshot.forward,
    snapshot.reverse,
    snapshot.unmapped,
    snapshot.secondary,
    snapshot.supplementary,
    snapshot.lowQuality,
  ];
  if (snapshot.label !== undefined) fields.push(snapshot.label);
  if (snapshot.source !== undefined) fields.push(snapshot.source);
  return fields.join(" ");
}

/**
 * Writes snapshots in counts-file layout
 */
export class CountsWriter {
  /**
   * Format snapshots, one line each, newline-terminated
   */
  formatSnapshots(snapshots: readonly CountSnapshot[]): string {
    return snapshots.map((snapshot) => `${formatCountsLine(snapshot)}\n`).join("");
  }

  /**
   * Write snapshots to a file (`.gz` paths are compressed)
   * @throws {FileError} When the write fails
   */
  async writeToFile(filePath: string, snapshots: readonly CountSnapshot[]): Promise<void> {
    const { writeString } = await import("../io/file-writer");
    await writeString(filePath, this.formatSnapshots(snapshots));
  }
}
