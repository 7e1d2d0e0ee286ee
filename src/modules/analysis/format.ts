/**
 * Result presentation.
 *
 * Output line: `date,total,negativeRatio,closedRatio,closedAndNegativeRatio`.
 * A window without records prints empty ratio fields (`2021-02-01,0,,,`)
 * instead of a division artifact.
 */
import { formatDateOnly } from "../../utils/dates";
import type { TagAnalysisResult, TagReport } from "./types";

export const RATIO_DECIMALS = 3;

export function toReport(result: TagAnalysisResult): TagReport {
  if (result.total === 0) {
    return { kind: "empty", total: 0 };
  }
  return {
    kind: "ratios",
    total: result.total,
    negativeRatio: result.negative / result.total,
    closedRatio: result.closed / result.total,
    closedAndNegativeRatio: result.closedAndNegative / result.total,
  };
}

export const formatRatio = (ratio: number): string => ratio.toFixed(RATIO_DECIMALS);

/**
 * Date a single-window result is reported under: the explicit upper bound, or
 * the latest record seen.
 */
export function resolveLabel(explicitTo: Date | null, result: TagAnalysisResult): Date | null {
  return explicitTo ?? result.maxDate;
}

export function formatResultLine(label: Date | null, result: TagAnalysisResult): string {
  const date = label === null ? "" : formatDateOnly(label);
  const report = toReport(result);

  if (report.kind === "empty") {
    return `${date},0,,,`;
  }

  return [
    date,
    String(report.total),
    formatRatio(report.negativeRatio),
    formatRatio(report.closedRatio),
    formatRatio(report.closedAndNegativeRatio),
  ].join(",");
}

/** Lines that open the section of one tag: a blank line, then the tag. */
export const formatTagHeader = (tag: string): string[] => ["", tag];
