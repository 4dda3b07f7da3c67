/**
 * Alignment-count extraction
 *
 * Buckets aligned reads by FLAG and MAPQ into the counts the strand
 * classifier consumes. A single running accumulator serves both the
 * single-shot and the block-wise modes, so sampling N blocks still costs one
 * pass over the records.
 */

import { resolveExtractOptions } from "../config";
import type {
  AlignmentCategory,
  AlignmentRecord,
  CountSnapshot,
  ExtractOptions,
  IncrementalExtractOptions,
} from "../types";
import { SAMFlagBits } from "../types";

/**
 * Assign an alignment record to exactly one bucket
 *
 * The first matching rule wins: unmapped, secondary, supplementary, low MAPQ,
 * then strand.
 *
 * @example
 * ```typescript
 * classifyAlignment({ flag: 16, mapq: 42 }, 20); // "reverse"
 * classifyAlignment({ flag: 20, mapq: 42 }, 20); // "unmapped" (0x4 wins over 0x10)
 * ```
 */
export function classifyAlignment(record: AlignmentRecord, mapqThreshold: number): AlignmentCategory {
  const { flag } = record;
  if ((flag & SAMFlagBits.UNMAPPED) !== 0) return "unmapped";
  if ((flag & SAMFlagBits.SECONDARY) !== 0) return "secondary";
  if ((flag & SAMFlagBits.SUPPLEMENTARY) !== 0) return "supplementary";
  if (record.mapq <= mapqThreshold) return "low-quality";
  return (flag & SAMFlagBits.REVERSE) !== 0 ? "reverse" : "forward";
}

/**
 * Running alignment counts
 * Maintains O(1) memory regardless of input size
 */
export class AlignmentCountAccumulator {
  private total = 0;
  private forward = 0;
  private reverse = 0;
  private unmapped = 0;
  private secondary = 0;
  private supplementary = 0;
  private lowQuality = 0;

  constructor(private readonly mapqThreshold: number) {}

  /**
   * Count one alignment record
   */
  add(record: AlignmentRecord): AlignmentCategory {
    const category = classifyAlignment(record, this.mapqThreshold);
    this.total++;
    switch (category) {
      case "forward":
        this.forward++;
        break;
      case "reverse":
        this.reverse++;
        break;
      case "unmapped":
        this.unmapped++;
        break;
      case "secondary":
        this.secondary++;
        break;
      case "supplementary":
        this.supplementary++;
        break;
      case "low-quality":
        this.lowQuality++;
        break;
    }
    return category;
  }

  /** Records counted so far */
  get count(): number {
    return this.total;
  }

  /**
   * Freeze the current counts
   */
  snapshot(label?: string, source?: string): CountSnapshot {
    return {
      total: this.total,
      forward: this.forward,
      reverse: this.reverse,
      unmapped: this.unmapped,
      secondary: this.secondary,
      supplementary: this.supplementary,
      lowQuality: this.lowQuality,
      ...(label !== undefined && { label }),
      ...(source !== undefined && { source }),
    };
  }

  reset(): void {
    this.total = 0;
    this.forward = 0;
    this.reverse = 0;
    this.unmapped = 0;
    this.secondary = 0;
    this.supplementary = 0;
    this.lowQuality = 0;
  }
}

/**
 * Label for the n-th block: "3M" for million-read blocks, "500K" for
 * thousand-read blocks, the read count otherwise. Partial blocks get a
 * "_partial" suffix and carry the number of the block they would have completed.
 */
export function formatBlockLabel(blockNumber: number, blockSize: number, partial = false): string {
  const reads = blockNumber * blockSize;
  let label: string;
  if (blockSize % 1_000_000 === 0) {
    label = `${reads / 1_000_000}M`;
  } else if (blockSize % 1_000 === 0) {
    label = `${reads / 1_000}K`;
  } else {
    label = `${reads}`;
  }
  return partial ? `${label}_partial` : label;
}

/**
 * Count every record of a sample into one snapshot
 *
 * @example
 * ```typescript
 * const parser = new SAMParser();
 * const counts = await countAlignments(parser.parseFile("sample.sam"), { mapqThreshold: 10 });
 * console.log(`${counts.forward} forward / ${counts.reverse} reverse`);
 * ```
 */
export async function countAlignments(
  records: AsyncIterable<AlignmentRecord> | Iterable<AlignmentRecord>,
  options: ExtractOptions = {}
): Promise<CountSnapshot> {
  const resolved = resolveExtractOptions(options);
  const accumulator = new AlignmentCountAccumulator(resolved.mapqThreshold);

  if (Symbol.asyncIterator in records) {
    for await (const record of records) {
      accumulator.add(record);
    }
  } else {
    for (const record of records) {
      accumulator.add(record);
    }
  }

  return accumulator.snapshot(resolved.label, resolved.source);
}

/**
 * Emit cumulative snapshots at every block boundary
 *
 * One snapshot per `blockSize` records, at most `maxBlocks` of them. When the
 * input ends between boundaries and the budget is not spent, a final partial
 * snapshot follows. Input is no longer consumed once the budget is spent, and
 * a consumer may stop early by breaking out of the loop.
 *
 * @example Stop as soon as a call can be made
 * ```typescript
 * for await (const snapshot of countAlignmentsIncremental(records, { blockSize: 1_000_000 })) {
 *   const report = classifyStrandedness(snapshot);
 *   if (report.strandedness !== "insufficient-data") break;
 * }
 * ```
 */
export async function* countAlignmentsIncremental(
  records: AsyncIterable<AlignmentRecord> | Iterable<AlignmentRecord>,
  options: IncrementalExtractOptions = {}
): AsyncGenerator<CountSnapshot, void, undefined> {
  const { mapqThreshold, blockSize, maxBlocks, source } = resolveExtractOptions(options);

  const accumulator = new AlignmentCountAccumulator(mapqThreshold);
  let emitted = 0;

  for await (const record of records) {
    accumulator.add(record);
    if (accumulator.count % blockSize === 0) {
      emitted++;
      yield accumulator.snapshot(formatBlockLabel(emitted, blockSize), source);
      if (emitted >= maxBlocks) return;
    }
  }

  if (accumulator.count > 0 && accumulator.count % blockSize !== 0) {
    yield accumulator.snapshot(formatBlockLabel(emitted + 1, blockSize, true), source);
  }
}
