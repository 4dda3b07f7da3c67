/**
 * Tab-separated strandedness report
 *
 * One header row plus one row per StatisticsReport. Two layouts: the full
 * statistics table, and the shorter count-based table used for block-wise
 * sampling runs. Undefined statistics print as "NA".
 */

import type { StatisticsReport } from "../types";

/** Placeholder printed for a statistic that is undefined */
export const MISSING_VALUE = "NA";

/**
 * Report columns after the key column
 */
export const REPORT_COLUMNS = [
  "Strandedness",
  "Fwd",
  "Rev",
  "Total",
  "Fwd_Ratio",
  "Rev_Ratio",
  "F2R_Ratio",
  "Log2_F2R",
  "Rel_Diff",
  "Chi2",
  "P_value",
  "Cohens_h",
  "Cramers_V",
  "Bayes_Factor",
  "Epsilon",
  "Hellinger",
  "Entropy",
] as const;

/**
 * Columns of the count-based layout, after the key column
 */
export const COUNT_REPORT_COLUMNS = [
  "Strandedness",
  "Fwd",
  "Rev",
  "Total",
  "Diff",
  "Log2_FC",
  "Chi2",
  "P_value",
  "Binomial_P",
] as const;

/**
 * "statistics" writes REPORT_COLUMNS, "counts" writes COUNT_REPORT_COLUMNS
 */
export type ReportLayout = "statistics" | "counts";

/**
 * First column of the table: one row per file, or one row per sampling block
 */
export type ReportKeyColumn = "File" | "ReadsCounts";

export interface ReportWriterOptions {
  /** Column set (default "statistics") */
  layout?: ReportLayout;
  /** Header of the first column (default "File", or "ReadsCounts" for the counts layout) */
  keyColumn?: ReportKeyColumn;
  /** Field separator (default tab) */
  delimiter?: string;
}

/**
 * Fixed-point with `digits` decimals, or NA
 */
export function formatFixed(value: number | null, digits = 6): string {
  return value === null ? MISSING_VALUE : value.toFixed(digits);
}

/**
 * Exponent notation with `digits` fraction digits and an exponent of at
 * least two digits ("1.234560e-05"), or NA
 */
export function formatScientific(value: number | null, digits = 6): string {
  if (value === null) return MISSING_VALUE;
  const [mantissa = "", exponent = "0"] = value.toExponential(digits).split("e");
  const sign = exponent.startsWith("-") ? "-" : "+";
  const exponentDigits = exponent.replace(/^[+-]/, "").padStart(2, "0");
  return `${mantissa}e${sign}${exponentDigits}`;
}

/**
 * Name shown in the key column: source for per-file rows, label for
 * per-block rows, whichever exists otherwise
 */
function rowKey(report: StatisticsReport, keyColumn: ReportKeyColumn): string {
  const key = keyColumn === "File" ? (report.source ?? report.label) : (report.label ?? report.source);
  return key ?? MISSING_VALUE;
}

/**
 * Formats StatisticsReports as a delimited table
 *
 * @example
 * ```typescript
 * const writer = new ReportWriter({ layout: "counts" });
 * await writeString("steps.tsv", writer.formatTable(reports));
 * ```
 */
export class ReportWriter {
  private readonly layout: ReportLayout;
  private readonly keyColumn: ReportKeyColumn;
  private readonly delimiter: string;

  constructor(options: ReportWriterOptions = {}) {
    this.layout = options.layout ?? "statistics";
    this.keyColumn = options.keyColumn ?? (this.layout === "counts" ? "ReadsCounts" : "File");
    this.delimiter = options.delimiter ?? "\t";
  }

  formatHeader(): string {
    const columns = this.layout === "counts" ? COUNT_REPORT_COLUMNS : REPORT_COLUMNS;
    return [this.keyColumn, ...columns].join(this.delimiter);
  }

  formatRow(report: StatisticsReport): string {
    const fields = this.layout === "counts" ? this.countFields(report) : this.statisticsFields(report);
    return [rowKey(report, this.keyColumn), ...fields].join(this.delimiter);
  }

  private countFields(report: StatisticsReport): string[] {
    return [
      report.strandedness,
      String(report.fwd),
      String(report.rev),
      String(report.total),
      String(report.diff),
      formatFixed(report.log2FoldChange, 4),
      formatFixed(report.chi2, 2),
      formatScientific(report.pValue, 2),
      formatScientific(report.binomialPValue, 2),
    ];
  }

  private statisticsFields(report: StatisticsReport): string[] {
    return [
      report.strandedness,
      String(report.fwd),
      String(report.rev),
      String(report.total),
      formatFixed(report.fwdRatio),
      formatFixed(report.revRatio),
      formatFixed(report.f2rRatio),
      formatFixed(report.log2F2R),
      formatFixed(report.relDiff),
      formatFixed(report.chi2),
      formatScientific(report.pValue),
      formatFixed(report.cohensH),
      formatFixed(report.cramersV),
      formatScientific(report.bayesFactor),
      formatFixed(report.epsilon),
      formatFixed(report.hellinger),
      formatFixed(report.entropy),
    ];
  }

  /**
   * Header plus one row per report, newline-separated, no trailing newline
   */
  formatTable(reports: readonly StatisticsReport[]): string {
    return [this.formatHeader(), ...reports.map((report) => this.formatRow(report))].join("\n");
  }

  /**
   * Write the table to a file
   * @throws {FileError} When the write fails
   */
  async writeToFile(filePath: string, reports: readonly StatisticsReport[]): Promise<void> {
    const { writeString } = await import("../io/file-writer");
    await writeString(filePath, `${this.formatTable(reports)}\n`);
  }
}

/**
 * Format reports as a tab-separated table; see ReportWriterOptions for defaults
 */
export function formatReportTable(reports: readonly StatisticsReport[], options: ReportWriterOptions = {}): string {
  return new ReportWriter(options).formatTable(reports);
}
