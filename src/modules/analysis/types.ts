/**
 * Analysis Types.
 *
 * Purpose: Shapes shared by the window filter, the aggregator, the month
 * driver and the presentation layer.
 */

/**
 * Inclusive date interval. `null` leaves that side unbounded; it is never
 * replaced by a sentinel date.
 */
export interface TimeWindow {
  readonly from: Date | null;
  readonly to: Date | null;
}

export const UNBOUNDED_WINDOW: TimeWindow = { from: null, to: null };

/**
 * Counters folded over the accepted records of one (tag, window) call.
 * Owned by the call that creates it; ratios are derived later by `toReport`.
 */
export interface TagAnalysisResult {
  total: number;
  /** Records with `score < 0`. */
  negative: number;
  /** Records with `closed_date > 0`. */
  closed: number;
  closedAndNegative: number;
  /** Earliest accepted creation date, null while `total` is 0. */
  minDate: Date | null;
  /** Latest accepted creation date, null while `total` is 0. */
  maxDate: Date | null;
}

/** One calendar-month sub-window. Labeled by its end date. */
export interface MonthBucket {
  readonly from: Date;
  readonly to: Date;
}

/** Presentation of a window with no accepted records. */
export interface EmptyTagReport {
  readonly kind: "empty";
  readonly total: 0;
}

export interface RatioTagReport {
  readonly kind: "ratios";
  readonly total: number;
  readonly negativeRatio: number;
  readonly closedRatio: number;
  readonly closedAndNegativeRatio: number;
}

export type TagReport = EmptyTagReport | RatioTagReport;

/** A result and the date it is reported under. */
export interface LabeledResult {
  readonly label: Date | null;
  readonly result: TagAnalysisResult;
}

/** Receives one output line at a time, without the trailing newline. */
export type OutputWriter = (line: string) => void;
