/**
 * Analysis Module.
 *
 * Purpose: Windowed statistics over the stored snapshots of each tag.
 */

export { analysisService, AnalysisService } from "./service";
export type { AnalyzeInput, AnalysisSummary } from "./service";
export {
  analyzeTag,
  analyzeRecords,
  analyzeRecordsByWindow,
  analyzeTagWindows,
  accumulate,
  createEmptyResult,
  isClosed,
  type WindowResult,
} from "./aggregator";
export { acceptInWindow } from "./window";
export { forEachMonth, monthBuckets, BY_MONTH_REQUIRES_WINDOW } from "./months";
export { discoverTags } from "./tags";
export {
  toReport,
  formatRatio,
  formatResultLine,
  formatTagHeader,
  resolveLabel,
  RATIO_DECIMALS,
} from "./format";
export { UNBOUNDED_WINDOW } from "./types";
export type {
  TimeWindow,
  TagAnalysisResult,
  MonthBucket,
  TagReport,
  EmptyTagReport,
  RatioTagReport,
  LabeledResult,
  OutputWriter,
} from "./types";
