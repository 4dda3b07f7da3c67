/**
 * Verbal interpretation of strand statistics
 *
 * Magnitude labels for the effect sizes and the Bayes factor, and a
 * multi-line report for reading one sample's result at a terminal.
 *
 * @module interpret
 */

import type { StatisticsReport } from "../types";

/** Significance level of the chi-square verdict */
export const SIGNIFICANCE_LEVEL = 0.05;

export type EffectMagnitude = "negligible" | "small" | "medium" | "large" | "very large";

export type EvidenceStrength = "none" | "weak" | "moderate" | "strong" | "very strong" | "extreme";

/**
 * Conventional magnitude of Cohen's h: |h| < 0.2 small, < 0.5 medium,
 * < 0.8 large, otherwise very large
 */
export function interpretCohensH(h: number): EffectMagnitude {
  const magnitude = Math.abs(h);
  if (magnitude < 0.2) return "small";
  if (magnitude < 0.5) return "medium";
  if (magnitude < 0.8) return "large";
  return "very large";
}

/**
 * Magnitude of Cramér's V with one degree of freedom
 */
export function interpretCramersV(v: number): EffectMagnitude {
  if (v < 0.1) return "negligible";
  if (v < 0.3) return "small";
  if (v < 0.5) return "medium";
  return "large";
}

/**
 * Strength of evidence for a strand bias carried by BF10
 *
 * Jeffreys' scale: 1-3 weak, 3-10 moderate, 10-30 strong, 30-100 very
 * strong, above 100 extreme.
 */
export function interpretBayesFactor(bayesFactor: number): EvidenceStrength {
  if (bayesFactor > 100) return "extreme";
  if (bayesFactor > 30) return "very strong";
  if (bayesFactor > 10) return "strong";
  if (bayesFactor > 3) return "moderate";
  if (bayesFactor > 1) return "weak";
  return "none";
}

function fixed4(value: number | null): string {
  return value === null ? "NA" : value.toFixed(4);
}

function exponent4(value: number | null): string {
  return value === null ? "NA" : value.toExponential(4);
}

function percent(value: number | null): string {
  return value === null ? "" : ` (${(value * 100).toFixed(2)}%)`;
}

function withLabel(value: string, label: string | undefined): string {
  return label === undefined ? value : `${value} (${label})`;
}

/**
 * Multi-line human-readable report for one sample
 *
 * @example
 * ```typescript
 * console.log(formatDetailedReport(classifyStrandedness(snapshot)));
 * ```
 */
export function formatDetailedReport(report: StatisticsReport): string {
  const rule = "=".repeat(60);
  const name = report.source ?? report.label ?? "sample";
  const lines: string[] = [rule, `Strand preference report: ${name}`, rule];

  lines.push(
    "",
    "[Counts]",
    `  Forward strand: ${report.fwd.toLocaleString("en-US")}`,
    `  Reverse strand: ${report.rev.toLocaleString("en-US")}`,
    `  Total         : ${report.total.toLocaleString("en-US")}`
  );

  lines.push(
    "",
    "[Proportions]",
    `  Forward ratio: ${fixed4(report.fwdRatio)}${percent(report.fwdRatio)}`,
    `  Reverse ratio: ${fixed4(report.revRatio)}${percent(report.revRatio)}`,
    `  F/R ratio: ${fixed4(report.f2rRatio)}`,
    `  Log2(F/R): ${fixed4(report.log2F2R)}`,
    `  Relative difference: ${fixed4(report.relDiff)}`
  );

  lines.push("", "[Chi-square test]", `  Chi-square: ${fixed4(report.chi2)}`, `  P-value: ${exponent4(report.pValue)}`);
  if (report.pValue !== null) {
    lines.push(
      report.pValue < SIGNIFICANCE_LEVEL
        ? `  Conclusion: P < ${SIGNIFICANCE_LEVEL}, strands significantly unbalanced`
        : `  Conclusion: P >= ${SIGNIFICANCE_LEVEL}, no significant imbalance`
    );
  }

  lines.push(
    "",
    "[Effect size]",
    `  Cohen's h: ${withLabel(fixed4(report.cohensH), report.cohensH === null ? undefined : interpretCohensH(report.cohensH))}`,
    `  Cramér's V: ${withLabel(fixed4(report.cramersV), report.cramersV === null ? undefined : interpretCramersV(report.cramersV))}`,
    `  Epsilon: ${fixed4(report.epsilon)}`,
    `  Hellinger distance: ${fixed4(report.hellinger)}`,
    `  Entropy: ${fixed4(report.entropy)}`
  );

  const evidence = report.bayesFactor === null ? undefined : `${interpretBayesFactor(report.bayesFactor)} evidence of bias`;
  lines.push(
    "",
    "[Bayes factor]",
    `  BF10: ${withLabel(exponent4(report.bayesFactor), evidence)}`,
    `  log10 BF10: ${fixed4(report.log10BayesFactor)}`
  );

  lines.push("", "[Strandedness]", `  Type: ${report.strandedness}`, "", rule);
  return lines.join("\n");
}
