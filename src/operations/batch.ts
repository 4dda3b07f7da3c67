/**
 * Per-file strandedness pipeline and batch runner
 *
 * Each input is analysed independently: SAM files go through the extractor
 * and the classifier, counts files straight through the classifier. Many
 * inputs run through a bounded Effect worker pool; one failing file is logged
 * and recorded without stopping the others.
 *
 * @module batch
 */

import { Effect, Either } from "effect";
import { resolveConcurrency } from "../config";
import { CountsParser } from "../formats/counts";
import { SAMParser } from "../formats/sam";
import type {
  ClassifyOptions,
  FileReaderOptions,
  IncrementalExtractOptions,
  ParserOptions,
  StatisticsReport,
} from "../types";
import { classifyStrandedness } from "./classify";
import { countAlignments, countAlignmentsIncremental } from "./extract";

export type InputKind = "sam" | "counts";

/**
 * Options for analysing one file
 */
export interface AnalyzeOptions extends IncrementalExtractOptions, ClassifyOptions {
  /** Emit one report per sampling block instead of one per file */
  incremental?: boolean;
  /** In incremental mode, stop at the first block that yields a call */
  stopEarly?: boolean;
  /** Options handed to the SAM or counts parser */
  parser?: ParserOptions;
  /** Options handed to the file reader */
  reader?: FileReaderOptions;
}

/**
 * Options for analysing many files
 */
export interface BatchOptions extends AnalyzeOptions {
  /** Files analysed at once (default 4) */
  concurrency?: number;
  /** Receives one message per failed file (default console.warn) */
  onWarning?: (warning: string) => void;
}

export interface FileFailure {
  readonly path: string;
  readonly error: Error;
}

export interface BatchResult {
  /** Reports of every successful file, in input order */
  readonly reports: StatisticsReport[];
  readonly failures: FileFailure[];
}

/**
 * Guess the input kind from a file name: `*.counts`, `*.counts.txt` (optionally
 * gzipped) are counts files, everything else is read as SAM
 */
export function detectInputKind(path: string): InputKind {
  return /\.counts(\.txt)?(\.gz)?$/i.test(path) ? "counts" : "sam";
}

/**
 * Count and classify the alignments of one SAM file
 *
 * @example
 * ```typescript
 * const reports = await analyzeSamFile("sample.sam.gz", { incremental: true, stopEarly: true });
 * console.log(reports.map((r) => `${r.label}: ${r.strandedness}`).join("\n"));
 * ```
 *
 * @throws {FileError} When the file cannot be opened
 * @throws {SamError} When an alignment line is malformed
 */
export async function analyzeSamFile(path: string, options: AnalyzeOptions = {}): Promise<StatisticsReport[]> {
  const parser = new SAMParser(options.parser);
  const records = parser.parseFile(path, options.reader);
  const extractOptions = { ...options, source: options.source ?? path };

  if (options.incremental !== true) {
    const snapshot = await countAlignments(records, extractOptions);
    return [classifyStrandedness(snapshot, options)];
  }

  const reports: StatisticsReport[] = [];
  for await (const snapshot of countAlignmentsIncremental(records, extractOptions)) {
    const report = classifyStrandedness(snapshot, options);
    reports.push(report);
    if (options.stopEarly === true && report.strandedness !== "insufficient-data") break;
  }
  return reports;
}

/**
 * Classify every snapshot of a counts file
 *
 * Snapshots without a source are attributed to the file itself.
 *
 * @throws {FileError} When the file cannot be opened
 * @throws {CountsFormatError} When a line is malformed
 * @throws {ValidationError} When a line holds impossible counts
 */
export async function analyzeCountsFile(path: string, options: AnalyzeOptions = {}): Promise<StatisticsReport[]> {
  const parser = new CountsParser(options.parser);
  const reports: StatisticsReport[] = [];
  for await (const snapshot of parser.parseFile(path, options.reader)) {
    const attributed = snapshot.source === undefined ? { ...snapshot, source: options.source ?? path } : snapshot;
    reports.push(classifyStrandedness(attributed, options));
  }
  return reports;
}

/**
 * Analyse one file according to its kind
 */
export function analyzeFile(path: string, options: AnalyzeOptions = {}): Promise<StatisticsReport[]> {
  return detectInputKind(path) === "counts" ? analyzeCountsFile(path, options) : analyzeSamFile(path, options);
}

function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}

/**
 * Analyse many files with bounded concurrency
 *
 * @example
 * ```typescript
 * const { reports, failures } = await analyzeFiles(["a.counts.txt", "b.sam"], { concurrency: 2 });
 * await new ReportWriter().writeToFile("strandedness.tsv", reports);
 * if (failures.length > 0) process.exitCode = 1;
 * ```
 *
 * @throws {ValidationError} When concurrency is not a positive integer
 */
export async function analyzeFiles(paths: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
  const concurrency = resolveConcurrency(options.concurrency);
  const onWarning = options.onWarning ?? ((warning: string): void => console.warn(warning));

  const program = Effect.forEach(
    paths,
    (path) =>
      Effect.tryPromise({
        try: () => analyzeFile(path, options),
        catch: toError,
      }).pipe(Effect.either),
    { concurrency }
  );

  const outcomes = await Effect.runPromise(program);

  const reports: StatisticsReport[] = [];
  const failures: FileFailure[] = [];
  outcomes.forEach((outcome, index) => {
    const path = paths[index] ?? "";
    if (Either.isLeft(outcome)) {
      failures.push({ path, error: outcome.left });
      onWarning(`Failed to analyse ${path}: ${outcome.left.message}`);
    } else {
      reports.push(...outcome.right);
    }
  });

  return { reports, failures };
}
