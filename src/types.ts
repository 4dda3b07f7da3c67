/**
 * Core type definitions for strandedness inference
 *
 * Plain interfaces describe the records flowing between the extractor and the
 * classifier; ArkType schemas validate the same shapes at the boundaries where
 * data arrives from files or callers.
 */

import { type } from "arktype";

// =============================================================================
// ALIGNMENT RECORDS
// =============================================================================

/**
 * The two fields of an aligned read the extractor needs
 *
 * Produced one per alignment line of the aligner's SAM output.
 */
export interface AlignmentRecord {
  /** SAM bitwise FLAG */
  readonly flag: number;
  /** MAPping Quality */
  readonly mapq: number;
  /** Query name, kept for error messages */
  readonly qname?: string;
  readonly lineNumber?: number;
}

/**
 * Bucket an alignment record is counted into
 */
export type AlignmentCategory =
  | "forward"
  | "reverse"
  | "unmapped"
  | "secondary"
  | "supplementary"
  | "low-quality";

/**
 * SAM FLAG bits consulted during extraction
 */
export const SAMFlagBits = {
  UNMAPPED: 0x4,
  REVERSE: 0x10,
  SECONDARY: 0x100,
  SUPPLEMENTARY: 0x800,
} as const;

// =============================================================================
// COUNTS AND REPORTS
// =============================================================================

/**
 * Aggregate alignment counts, cumulative from the first read of a sample
 */
export interface CountSnapshot {
  /** Every alignment record seen */
  readonly total: number;
  /** Primary, quality-passing alignments on the forward strand */
  readonly forward: number;
  /** Primary, quality-passing alignments on the reverse strand */
  readonly reverse: number;
  readonly unmapped: number;
  readonly secondary: number;
  readonly supplementary: number;
  /** Primary alignments at or below the MAPQ threshold */
  readonly lowQuality: number;
  /** Block label such as "2M" or "4M_partial" */
  readonly label?: string;
  /** Input the counts were taken from */
  readonly source?: string;
}

/**
 * Strandedness call, named after the library-type flags RNA-seq tools accept
 */
export type Strandedness = "fr-firststrand" | "fr-secondstrand" | "fr-unstranded" | "insufficient-data";

/**
 * Statistics derived from one CountSnapshot
 *
 * `null` marks a statistic that is undefined for the counts at hand
 * (zero denominator). No field ever holds NaN or Infinity.
 */
export interface StatisticsReport {
  readonly fwd: number;
  readonly rev: number;
  /** fwd + rev */
  readonly total: number;
  /** |fwd - rev| */
  readonly diff: number;
  readonly fwdRatio: number | null;
  readonly revRatio: number | null;
  /** null when rev is 0; the decision rule reads that as forward-dominant */
  readonly f2rRatio: number | null;
  readonly log2F2R: number | null;
  /** log2((F+0.5)/(R+0.5)) whatever the counts; null when there are no reads */
  readonly log2FoldChange: number | null;
  /** |F - R| / min(F, R); null when min(F, R) is 0 */
  readonly relDiff: number | null;
  readonly chi2: number | null;
  readonly pValue: number | null;
  /** Two-sided binomial test against p = 0.5, normal approximation */
  readonly binomialPValue: number | null;
  readonly cohensH: number | null;
  readonly cramersV: number | null;
  /** BF10, skewed split over 50/50; clamped to Number.MAX_VALUE */
  readonly bayesFactor: number | null;
  readonly log10BayesFactor: number | null;
  readonly epsilon: number;
  readonly hellinger: number;
  readonly entropy: number;
  readonly strandedness: Strandedness;
  readonly label?: string;
  readonly source?: string;
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options controlling how alignment records are bucketed
 */
export interface ExtractOptions {
  /** Primary alignments with MAPQ at or below this value are filtered (default 20) */
  mapqThreshold?: number;
  /** Label attached to a single-shot snapshot */
  label?: string;
  /** Source name attached to every snapshot */
  source?: string;
}

/**
 * Options for block-wise sampling
 */
export interface IncrementalExtractOptions extends ExtractOptions {
  /** Reads per block (default 1,000,000) */
  blockSize?: number;
  /** Maximum snapshots to emit (default 8) */
  maxBlocks?: number;
}

/**
 * Decision thresholds of the classifier
 */
export interface ClassifyOptions {
  /** Total at or below which no call is made (default 3000) */
  minTotal?: number;
  /** Rel_Diff at or below which the library is unstranded (default 1) */
  relDiffThreshold?: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip malformed lines instead of failing */
  skipInvalid?: boolean;
  /** Maximum line length before a line is rejected */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Bytes read from disk per chunk */
  bufferSize?: number;
  /** Decompress `.gz` inputs transparently */
  autoDecompress?: boolean;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const NonNegativeInteger = type("number>=0").narrow(
  (n, ctx) => Number.isInteger(n) || ctx.mustBe("an integer")
);

const PositiveInteger = type("number>=1").narrow(
  (n, ctx) => Number.isInteger(n) || ctx.mustBe("an integer")
);

/**
 * SAM FLAG: 12-bit unsigned integer
 */
export const SAMFlagSchema = type("number<=4095").and(NonNegativeInteger);

/**
 * MAPQ score (0-255, 255 meaning unavailable)
 */
export const MAPQScoreSchema = type("number<=255").and(NonNegativeInteger);

/**
 * Count snapshot with its cross-field invariants
 */
export const CountSnapshotSchema = type({
  total: NonNegativeInteger,
  forward: NonNegativeInteger,
  reverse: NonNegativeInteger,
  unmapped: NonNegativeInteger,
  secondary: NonNegativeInteger,
  supplementary: NonNegativeInteger,
  lowQuality: NonNegativeInteger,
  "label?": "string | undefined",
  "source?": "string | undefined",
})
  .narrow(
    (s, ctx) => s.forward + s.reverse <= s.total || ctx.mustBe("a snapshot with forward + reverse <= total")
  )
  .narrow(
    (s, ctx) =>
      s.forward + s.reverse + s.unmapped + s.secondary + s.supplementary + s.lowQuality <= s.total ||
      ctx.mustBe("a snapshot whose buckets sum to at most total")
  );

export const ExtractOptionsSchema = type({
  "mapqThreshold?": "number | undefined",
  "label?": "string | undefined",
  "source?": "string | undefined",
  "blockSize?": PositiveInteger.or("undefined"),
  "maxBlocks?": PositiveInteger.or("undefined"),
});

export const ClassifyOptionsSchema = type({
  "minTotal?": "number>=0 | undefined",
  "relDiffThreshold?": "number>=0 | undefined",
});

export const FilePathSchema = type("string>0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

export const BatchOptionsSchema = type({
  "concurrency?": PositiveInteger.or("undefined"),
});
