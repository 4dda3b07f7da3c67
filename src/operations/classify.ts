/**
 * Strand classifier
 *
 * Turns forward/reverse primary-alignment counts into a strandedness call and
 * a set of significance and effect-size statistics. Everything here is a pure
 * function of one CountSnapshot.
 *
 * @module classify
 */

import { type } from "arktype";
import { resolveClassifyOptions } from "../config";
import { ValidationError } from "../errors";
import type { ClassifyOptions, CountSnapshot, StatisticsReport, Strandedness } from "../types";
import { CountSnapshotSchema } from "../types";
import {
  binaryEntropy,
  chiSquareUpperTail,
  erfc,
  logBinomialLikelihoodRatio,
} from "./core/distributions";

// Log-space pseudocount applied when one strand has no reads
const LOG2_PSEUDOCOUNT = 0.5;

/**
 * Forward and reverse proportions of the informative reads
 */
export function computeProportions(fwd: number, rev: number): { fwdRatio: number; revRatio: number } | null {
  const total = fwd + rev;
  if (total === 0) return null;
  return { fwdRatio: fwd / total, revRatio: rev / total };
}

/**
 * Forward-to-reverse ratio; null when there are no reverse reads
 */
export function computeF2RRatio(fwd: number, rev: number): number | null {
  return rev > 0 ? fwd / rev : null;
}

/**
 * log2(F/R), switching to log2((F+0.5)/(R+0.5)) when either count is zero
 */
export function computeLog2F2R(fwd: number, rev: number): number | null {
  if (fwd + rev === 0) return null;
  if (fwd > 0 && rev > 0) return Math.log2(fwd / rev);
  return Math.log2((fwd + LOG2_PSEUDOCOUNT) / (rev + LOG2_PSEUDOCOUNT));
}

/**
 * log2((F+0.5)/(R+0.5)) for every split, so zero counts stay finite
 */
export function computeLog2FoldChange(fwd: number, rev: number): number | null {
  if (fwd + rev === 0) return null;
  return Math.log2((fwd + LOG2_PSEUDOCOUNT) / (rev + LOG2_PSEUDOCOUNT));
}

/**
 * |F - R| / min(F, R); null when the smaller count is zero (unbounded)
 */
export function computeRelativeDifference(fwd: number, rev: number): number | null {
  const smaller = Math.min(fwd, rev);
  if (smaller === 0) return null;
  return Math.abs(fwd - rev) / smaller;
}

/**
 * Chi-square goodness of fit against a 50/50 split, one degree of freedom
 *
 * @returns statistic and upper-tail p-value, or null when there are no reads
 */
export function computeChiSquare(fwd: number, rev: number): { chi2: number; pValue: number } | null {
  const total = fwd + rev;
  if (total === 0) return null;

  const expected = total / 2;
  const chi2 = ((fwd - expected) ** 2 + (rev - expected) ** 2) / expected;
  return { chi2, pValue: chiSquareUpperTail(chi2) };
}

/**
 * Two-sided binomial test of fwd successes in fwd + rev trials against p = 0.5
 *
 * Uses the normal approximation z = |F - n/2| / sqrt(n/4), p = erfc(z / sqrt 2).
 * Without a continuity correction this agrees with the chi-square p-value.
 */
export function computeBinomialPValue(fwd: number, rev: number): number | null {
  const n = fwd + rev;
  if (n === 0) return null;

  const z = Math.abs(fwd - n / 2) / Math.sqrt(n / 4);
  return Math.min(1, Math.max(0, erfc(z / Math.SQRT2)));
}

/**
 * Cohen's h between the forward and reverse proportions
 *
 * |h| < 0.2 small, < 0.5 medium, < 0.8 large, otherwise very large.
 */
export function computeCohensH(fwdRatio: number, revRatio: number): number {
  return 2 * Math.asin(Math.sqrt(fwdRatio)) - 2 * Math.asin(Math.sqrt(revRatio));
}

/**
 * Cramér's V for a two-category test: sqrt(chi2 / n)
 */
export function computeCramersV(chi2: number, total: number): number {
  return Math.sqrt(chi2 / total);
}

/**
 * Binomial likelihood-ratio Bayes factor for a skewed split over 50/50
 *
 * The factor overflows a double past roughly 1024 bits of evidence; the
 * log10 value stays exact and the factor itself is clamped.
 */
export function computeBayesFactor(fwd: number, rev: number): { bayesFactor: number; log10BayesFactor: number } {
  const logRatio = logBinomialLikelihoodRatio(fwd, rev);
  const bayesFactor = Math.exp(logRatio);
  return {
    bayesFactor: Number.isFinite(bayesFactor) ? bayesFactor : Number.MAX_VALUE,
    log10BayesFactor: logRatio / Math.LN10,
  };
}

/**
 * Hellinger distance between (p, q) and (0.5, 0.5)
 */
export function computeHellinger(fwdRatio: number, revRatio: number): number {
  const half = Math.sqrt(0.5);
  return Math.SQRT1_2 * Math.sqrt((Math.sqrt(fwdRatio) - half) ** 2 + (Math.sqrt(revRatio) - half) ** 2);
}

/**
 * Three-tier strandedness decision
 *
 * 1. total <= minTotal: insufficient-data
 * 2. relDiff <= relDiffThreshold: fr-unstranded
 * 3. F2R > 1: fr-firststrand, else fr-secondstrand
 *
 * A null relDiff means one strand is empty and counts as unbounded; a null
 * F2R ratio means no reverse reads and counts as forward-dominant.
 */
export function determineStrandedness(
  total: number,
  relDiff: number | null,
  f2rRatio: number | null,
  options: ClassifyOptions = {}
): Strandedness {
  const { minTotal, relDiffThreshold } = resolveClassifyOptions(options);

  if (total <= minTotal) {
    return "insufficient-data";
  }
  if (relDiff !== null && relDiff <= relDiffThreshold) {
    return "fr-unstranded";
  }
  if (f2rRatio === null || f2rRatio > 1) {
    return "fr-firststrand";
  }
  return "fr-secondstrand";
}

/**
 * Reject counts that cannot have come from an extraction pass
 * @throws {ValidationError} On negative or fractional counts, or forward + reverse > total
 */
export function validateSnapshot(snapshot: CountSnapshot): void {
  const validation = CountSnapshotSchema(snapshot);
  if (validation instanceof type.errors) {
    const where = snapshot.label ?? snapshot.source;
    throw new ValidationError(
      `Invalid count snapshot: ${validation.summary}`,
      undefined,
      where !== undefined ? `snapshot ${where}` : undefined
    );
  }
}

/**
 * Compute every statistic and the strandedness call for one snapshot
 *
 * Only forward and reverse primary, quality-passing reads enter the
 * statistics; the other buckets are validated but otherwise ignored.
 *
 * @example
 * ```typescript
 * const report = classifyStrandedness({
 *   total: 1_000_000, forward: 3117, reverse: 37696,
 *   unmapped: 959187, secondary: 0, supplementary: 0, lowQuality: 0,
 * });
 * report.strandedness; // "fr-secondstrand"
 * ```
 *
 * @throws {ValidationError} When the snapshot is malformed
 */
export function classifyStrandedness(snapshot: CountSnapshot, options: ClassifyOptions = {}): StatisticsReport {
  validateSnapshot(snapshot);

  const fwd = snapshot.forward;
  const rev = snapshot.reverse;
  const total = fwd + rev;
  const diff = Math.abs(fwd - rev);
  const f2rRatio = computeF2RRatio(fwd, rev);
  const relDiff = computeRelativeDifference(fwd, rev);
  const strandedness = determineStrandedness(total, relDiff, f2rRatio, options);
  const origin = {
    ...(snapshot.label !== undefined && { label: snapshot.label }),
    ...(snapshot.source !== undefined && { source: snapshot.source }),
  };

  const proportions = computeProportions(fwd, rev);
  const chiSquare = computeChiSquare(fwd, rev);
  if (proportions === null || chiSquare === null) {
    return {
      fwd,
      rev,
      total,
      diff,
      fwdRatio: null,
      revRatio: null,
      f2rRatio: null,
      log2F2R: null,
      log2FoldChange: null,
      relDiff: null,
      chi2: null,
      pValue: null,
      binomialPValue: null,
      cohensH: null,
      cramersV: null,
      bayesFactor: null,
      log10BayesFactor: null,
      epsilon: 0,
      hellinger: 0,
      entropy: 0,
      strandedness,
      ...origin,
    };
  }

  const { fwdRatio, revRatio } = proportions;
  const { bayesFactor, log10BayesFactor } = computeBayesFactor(fwd, rev);

  return {
    fwd,
    rev,
    total,
    diff,
    fwdRatio,
    revRatio,
    f2rRatio,
    log2F2R: computeLog2F2R(fwd, rev),
    log2FoldChange: computeLog2FoldChange(fwd, rev),
    relDiff,
    chi2: chiSquare.chi2,
    pValue: chiSquare.pValue,
    binomialPValue: computeBinomialPValue(fwd, rev),
    cohensH: computeCohensH(fwdRatio, revRatio),
    cramersV: computeCramersV(chiSquare.chi2, total),
    bayesFactor,
    log10BayesFactor,
    epsilon: Math.abs(fwdRatio - 0.5),
    hellinger: computeHellinger(fwdRatio, revRatio),
    entropy: binaryEntropy(fwdRatio, revRatio),
    strandedness,
    ...origin,
  };
}
