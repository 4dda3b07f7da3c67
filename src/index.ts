/**
 * strandcheck - strand-specificity inference for RNA-seq libraries
 *
 * Counts primary, confidently mapped alignments by strand and decides
 * whether a library is fr-firststrand, fr-secondstrand or unstranded.
 */

// Configuration
export {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAPQ_THRESHOLD,
  DEFAULT_MAX_BLOCKS,
  DEFAULT_MIN_TOTAL,
  DEFAULT_REL_DIFF_THRESHOLD,
  resolveClassifyOptions,
  resolveConcurrency,
  resolveExtractOptions,
} from './config';
export type { ResolvedClassifyOptions, ResolvedExtractOptions } from './config';
// Error types
export {
  BufferError,
  CountsFormatError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  SamError,
  StrandcheckError,
  StreamError,
  ValidationError,
} from './errors';
// Counts files
export { CountsParser, CountsWriter, formatCountsLine } from './formats/counts';
// TSV report
export {
  COUNT_REPORT_COLUMNS,
  formatFixed,
  formatReportTable,
  formatScientific,
  MISSING_VALUE,
  REPORT_COLUMNS,
  ReportWriter,
} from './formats/report';
export type { ReportKeyColumn, ReportLayout, ReportWriterOptions } from './formats/report';
// SAM format
export { SAMParser } from './formats/sam';
// File I/O infrastructure
export { FileReader } from './io/file-reader';
export { deleteFile, writeString } from './io/file-writer';
export { StreamUtils } from './io/stream-utils';
// Batch analysis
export {
  analyzeCountsFile,
  analyzeFile,
  analyzeFiles,
  analyzeSamFile,
  detectInputKind,
} from './operations/batch';
export type { AnalyzeOptions, BatchOptions, BatchResult, FileFailure, InputKind } from './operations/batch';
// Strand classifier
export {
  classifyStrandedness,
  computeBayesFactor,
  computeBinomialPValue,
  computeChiSquare,
  computeCohensH,
  computeCramersV,
  computeF2RRatio,
  computeHellinger,
  computeLog2F2R,
  computeLog2FoldChange,
  computeProportions,
  computeRelativeDifference,
  determineStrandedness,
  validateSnapshot,
} from './operations/classify';
// Alignment-count extractor
export {
  AlignmentCountAccumulator,
  classifyAlignment,
  countAlignments,
  countAlignmentsIncremental,
  formatBlockLabel,
} from './operations/extract';
// Interpretation
export {
  formatDetailedReport,
  interpretBayesFactor,
  interpretCohensH,
  interpretCramersV,
  SIGNIFICANCE_LEVEL,
} from './operations/interpret';
export type { EffectMagnitude, EvidenceStrength } from './operations/interpret';
// Core types
export type {
  AlignmentCategory,
  AlignmentRecord,
  ClassifyOptions,
  CountSnapshot,
  ExtractOptions,
  FileReaderOptions,
  IncrementalExtractOptions,
  ParserOptions,
  StatisticsReport,
  Strandedness,
} from './types';
export {
  BatchOptionsSchema,
  ClassifyOptionsSchema,
  CountSnapshotSchema,
  ExtractOptionsSchema,
  FilePathSchema,
  MAPQScoreSchema,
  SAMFlagBits,
  SAMFlagSchema,
} from './types';
