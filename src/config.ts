/**
 * Default settings and option resolution
 *
 * Options merge in order: library defaults, then caller values. The merged
 * object is validated with ArkType before use so a bad threshold fails at the
 * call site rather than deep inside a streaming pass.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";
import type { ClassifyOptions, IncrementalExtractOptions } from "./types";
import { BatchOptionsSchema, ClassifyOptionsSchema, ExtractOptionsSchema } from "./types";

/** Primary alignments at or below this MAPQ are treated as unreliable */
export const DEFAULT_MAPQ_THRESHOLD = 20;

/** Reads per incremental sampling block */
export const DEFAULT_BLOCK_SIZE = 1_000_000;

/** Snapshots emitted before incremental sampling stops */
export const DEFAULT_MAX_BLOCKS = 8;

/** Informative reads needed before a strand call is attempted */
export const DEFAULT_MIN_TOTAL = 3000;

/** Rel_Diff at or below which forward and reverse are considered balanced */
export const DEFAULT_REL_DIFF_THRESHOLD = 1;

/** Files analysed at once by the batch runner */
export const DEFAULT_CONCURRENCY = 4;

export interface ResolvedExtractOptions {
  readonly mapqThreshold: number;
  readonly blockSize: number;
  readonly maxBlocks: number;
  readonly label: string | undefined;
  readonly source: string | undefined;
}

export interface ResolvedClassifyOptions {
  readonly minTotal: number;
  readonly relDiffThreshold: number;
}

/**
 * Merge extraction options with defaults
 * @throws {ValidationError} When an option is out of range
 */
export function resolveExtractOptions(options: IncrementalExtractOptions = {}): ResolvedExtractOptions {
  const validation = ExtractOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid extract options: ${validation.summary}`);
  }

  return {
    mapqThreshold: options.mapqThreshold ?? DEFAULT_MAPQ_THRESHOLD,
    blockSize: options.blockSize ?? DEFAULT_BLOCK_SIZE,
    maxBlocks: options.maxBlocks ?? DEFAULT_MAX_BLOCKS,
    label: options.label,
    source: options.source,
  };
}

/**
 * Merge classifier thresholds with defaults
 * @throws {ValidationError} When a threshold is negative
 */
export function resolveClassifyOptions(options: ClassifyOptions = {}): ResolvedClassifyOptions {
  const validation = ClassifyOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid classify options: ${validation.summary}`);
  }

  return {
    minTotal: options.minTotal ?? DEFAULT_MIN_TOTAL,
    relDiffThreshold: options.relDiffThreshold ?? DEFAULT_REL_DIFF_THRESHOLD,
  };
}

/**
 * Number of files the batch runner analyses at once
 * @throws {ValidationError} When concurrency is not a positive integer
 */
export function resolveConcurrency(concurrency?: number): number {
  const validation = BatchOptionsSchema({ concurrency });
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid batch options: ${validation.summary}`);
  }
  return concurrency ?? DEFAULT_CONCURRENCY;
}
