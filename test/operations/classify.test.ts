/**
 * Tests for the strand classifier
 */

import { describe, expect, test } from "vitest";
import {
  classifyStrandedness,
  computeBayesFactor,
  computeBinomialPValue,
  computeChiSquare,
  computeF2RRatio,
  computeLog2F2R,
  computeLog2FoldChange,
  computeProportions,
  computeRelativeDifference,
  determineStrandedness,
  formatScientific,
  validateSnapshot,
  ValidationError,
  type CountSnapshot,
} from "../../src/index";

function snapshot(forward: number, reverse: number, extra: Partial<CountSnapshot> = {}): CountSnapshot {
  return {
    total: forward + reverse,
    forward,
    reverse,
    unmapped: 0,
    secondary: 0,
    supplementary: 0,
    lowQuality: 0,
    ...extra,
  };
}

describe("classifyStrandedness", () => {
  test("balanced strands are unstranded", () => {
    const report = classifyStrandedness(snapshot(4142, 3953));

    expect(report.strandedness).toBe("fr-unstranded");
    expect(report.total).toBe(8095);
    expect(report.relDiff).toBeCloseTo(0.047812, 6);
    expect(report.f2rRatio).toBeCloseTo(1.047812, 6);
    expect(report.fwdRatio).toBeCloseTo(0.511674, 6);
    expect(report.revRatio).toBeCloseTo(0.488326, 6);
    expect(report.log2F2R).toBeCloseTo(0.06738, 5);
    expect(report.chi2).toBeCloseTo(4.412724, 6);
    expect(formatScientific(report.pValue)).toBe("3.567184e-02");
    expect(report.diff).toBe(189);
    expect(report.log2FoldChange).toBeCloseTo(0.0673713, 6);
    expect(report.binomialPValue).toBeCloseTo(0.0356718377680153, 12);
    expect(report.cohensH).toBeCloseTo(0.0467, 4);
    expect(report.cramersV).toBeCloseTo(0.023348, 6);
    expect(report.bayesFactor).toBeCloseTo(9.084434, 4);
    expect(report.log10BayesFactor).toBeCloseTo(0.958298, 6);
    expect(report.epsilon).toBeCloseTo(0.011674, 6);
    expect(report.hellinger).toBeCloseTo(0.008255, 6);
    expect(report.entropy).toBeCloseTo(0.999607, 6);
  });

  test("p-values keep seven significant digits far into the tail", () => {
    const report = classifyStrandedness(snapshot(51000, 49000));

    expect(report.chi2).toBe(40);
    expect(formatScientific(report.pValue)).toBe("2.539629e-10");
    expect(formatScientific(report.binomialPValue)).toBe("2.539629e-10");
    expect(report.strandedness).toBe("fr-unstranded");
  });

  test("reverse-dominant libraries are fr-secondstrand", () => {
    const report = classifyStrandedness(
      snapshot(3117, 37696, { total: 1_000_000, unmapped: 959_187 })
    );

    expect(report.strandedness).toBe("fr-secondstrand");
    expect(report.total).toBe(40813);
    expect(report.relDiff).toBeCloseTo(11.09368, 5);
    expect(report.f2rRatio).toBeCloseTo(0.082688, 6);
    expect(report.log2F2R).toBeCloseTo(-3.596181, 6);
    expect(report.pValue).toBe(0);
    expect(report.cohensH).toBeCloseTo(-2.0215905, 6);
    expect(report.cramersV).toBeCloseTo(0.847255, 6);
    expect(report.bayesFactor).toBe(Number.MAX_VALUE);
    expect(report.log10BayesFactor).toBeCloseTo(7503.4213, 3);
    expect(report.entropy).toBeCloseTo(0.3892675, 6);
  });

  test("forward-dominant libraries are fr-firststrand", () => {
    const report = classifyStrandedness(snapshot(37696, 3117));

    expect(report.strandedness).toBe("fr-firststrand");
    expect(report.f2rRatio).toBeCloseTo(12.093680, 5);
  });

  test("no reads gives insufficient-data with null statistics", () => {
    const report = classifyStrandedness(snapshot(0, 0));

    expect(report).toEqual({
      fwd: 0,
      rev: 0,
      total: 0,
      diff: 0,
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
      strandedness: "insufficient-data",
    });
  });

  test("totals at the minimum are insufficient", () => {
    expect(classifyStrandedness(snapshot(3000, 0)).strandedness).toBe("insufficient-data");
    expect(classifyStrandedness(snapshot(3001, 0)).strandedness).toBe("fr-firststrand");
  });

  test("no reverse reads resolves to fr-firststrand", () => {
    const report = classifyStrandedness(snapshot(5000, 0));

    expect(report.strandedness).toBe("fr-firststrand");
    expect(report.f2rRatio).toBeNull();
    expect(report.relDiff).toBeNull();
    expect(report.log2F2R).toBeCloseTo(13.287857, 6);
    expect(report.cohensH).toBeCloseTo(Math.PI, 10);
    expect(report.cramersV).toBe(1);
    expect(report.epsilon).toBe(0.5);
    expect(report.hellinger).toBeCloseTo(0.541196, 6);
    expect(report.entropy).toBe(0);
  });

  test("no forward reads resolves to fr-secondstrand", () => {
    const report = classifyStrandedness(snapshot(0, 5000));

    expect(report.strandedness).toBe("fr-secondstrand");
    expect(report.f2rRatio).toBe(0);
    expect(report.log2F2R).toBeCloseTo(-13.287857, 6);
  });

  test("swapping strands swaps ratios and flips the call", () => {
    const forward = classifyStrandedness(snapshot(9000, 1000));
    const reverse = classifyStrandedness(snapshot(1000, 9000));

    expect(forward.fwdRatio).toBe(reverse.revRatio);
    expect(forward.revRatio).toBe(reverse.fwdRatio);
    expect(forward.chi2).toBe(reverse.chi2);
    expect(forward.relDiff).toBe(reverse.relDiff);
    expect(forward.entropy).toBe(reverse.entropy);
    expect(forward.strandedness).toBe("fr-firststrand");
    expect(reverse.strandedness).toBe("fr-secondstrand");
  });

  test("swapping strands keeps an unstranded call", () => {
    expect(classifyStrandedness(snapshot(5000, 4000)).strandedness).toBe("fr-unstranded");
    expect(classifyStrandedness(snapshot(4000, 5000)).strandedness).toBe("fr-unstranded");
  });

  test("entropy is one bit for an even split", () => {
    const report = classifyStrandedness(snapshot(50, 50));

    expect(report.entropy).toBe(1);
    expect(report.chi2).toBe(0);
    expect(report.pValue).toBe(1);
    expect(report.bayesFactor).toBeCloseTo(1, 12);
    expect(report.hellinger).toBe(0);
  });

  test("no statistic is NaN or infinite", () => {
    const cases = [snapshot(0, 0), snapshot(1, 0), snapshot(0, 1), snapshot(10_000_000, 1)];
    for (const counts of cases) {
      const report = classifyStrandedness(counts);
      for (const value of Object.values(report)) {
        if (typeof value === "number") {
          expect(Number.isFinite(value)).toBe(true);
        }
      }
    }
  });

  test("carries label and source through", () => {
    const report = classifyStrandedness(snapshot(10, 10, { label: "2M", source: "a.sam" }));

    expect(report.label).toBe("2M");
    expect(report.source).toBe("a.sam");
  });

  test("custom thresholds change the call", () => {
    const counts = snapshot(60, 40);

    expect(classifyStrandedness(counts).strandedness).toBe("insufficient-data");
    expect(classifyStrandedness(counts, { minTotal: 50 }).strandedness).toBe("fr-unstranded");
    expect(classifyStrandedness(counts, { minTotal: 50, relDiffThreshold: 0.25 }).strandedness).toBe(
      "fr-firststrand"
    );
  });

  test("rejects negative thresholds", () => {
    expect(() => classifyStrandedness(snapshot(1, 1), { minTotal: -1 })).toThrow(ValidationError);
  });
});

describe("validateSnapshot", () => {
  test("accepts consistent counts", () => {
    expect(() => validateSnapshot(snapshot(5, 5, { total: 20, unmapped: 10 }))).not.toThrow();
  });

  test("rejects forward + reverse above total", () => {
    expect(() => validateSnapshot({ ...snapshot(5, 5), total: 9 })).toThrow(ValidationError);
  });

  test("rejects buckets that sum above total", () => {
    expect(() => validateSnapshot(snapshot(5, 5, { unmapped: 1 }))).toThrow(ValidationError);
  });

  test("rejects negative and fractional counts", () => {
    expect(() => validateSnapshot(snapshot(-1, 5, { total: 5 }))).toThrow(ValidationError);
    expect(() => validateSnapshot(snapshot(1.5, 5, { total: 7 }))).toThrow(ValidationError);
  });

  test("names the offending snapshot", () => {
    try {
      validateSnapshot({ ...snapshot(5, 5), total: 1, label: "3M" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.context).toBe("snapshot 3M");
    }
  });
});

describe("statistic helpers", () => {
  test("computeProportions", () => {
    expect(computeProportions(3, 1)).toEqual({ fwdRatio: 0.75, revRatio: 0.25 });
    expect(computeProportions(0, 0)).toBeNull();
  });

  test("computeF2RRatio", () => {
    expect(computeF2RRatio(3, 1)).toBe(3);
    expect(computeF2RRatio(3, 0)).toBeNull();
  });

  test("computeLog2F2R uses a pseudocount for an empty strand", () => {
    expect(computeLog2F2R(8, 2)).toBe(2);
    expect(computeLog2F2R(0, 1)).toBeCloseTo(Math.log2(0.5 / 1.5), 12);
    expect(computeLog2F2R(0, 0)).toBeNull();
  });

  test("computeLog2FoldChange always adds the pseudocount", () => {
    expect(computeLog2FoldChange(8, 2)).toBeCloseTo(Math.log2(8.5 / 2.5), 12);
    expect(computeLog2FoldChange(5000, 0)).toBeCloseTo(Math.log2(10001), 12);
    expect(computeLog2FoldChange(0, 0)).toBeNull();
  });

  test("computeRelativeDifference is normalised by the smaller count", () => {
    expect(computeRelativeDifference(300, 100)).toBe(2);
    expect(computeRelativeDifference(100, 300)).toBe(2);
    expect(computeRelativeDifference(100, 0)).toBeNull();
  });

  test("computeChiSquare", () => {
    const result = computeChiSquare(60, 40);
    expect(result?.chi2).toBe(4);
    expect(result?.pValue).toBeCloseTo(0.0455, 4);
    expect(computeChiSquare(0, 0)).toBeNull();
  });

  test("computeBinomialPValue", () => {
    expect(computeBinomialPValue(60, 40)).toBeCloseTo(0.04550026389635853, 12);
    expect(computeBinomialPValue(40, 60)).toBe(computeBinomialPValue(60, 40));
    expect(computeBinomialPValue(50, 50)).toBe(1);
    expect(computeBinomialPValue(0, 0)).toBeNull();
  });

  test("computeBayesFactor", () => {
    const { bayesFactor, log10BayesFactor } = computeBayesFactor(60, 40);
    expect(bayesFactor).toBeCloseTo(7.489869, 5);
    expect(log10BayesFactor).toBeCloseTo(0.874474, 6);
  });

  test("determineStrandedness treats a null Rel_Diff as unbounded", () => {
    expect(determineStrandedness(5000, null, null)).toBe("fr-firststrand");
    expect(determineStrandedness(5000, null, 0)).toBe("fr-secondstrand");
    expect(determineStrandedness(5000, 1, 2)).toBe("fr-unstranded");
    expect(determineStrandedness(5000, 1.01, 1)).toBe("fr-secondstrand");
  });
});
