/**
 * Tag Aggregator.
 *
 * Purpose: Fold the snapshot records of one tag into a `TagAnalysisResult`.
 * Context: Called once per (tag, window); by-month mode folds one pass over
 * the records into every bucket with `analyzeTagWindows`.
 *
 * Invariants:
 * - `negative <= total`, `closed <= total`,
 *   `closedAndNegative <= min(negative, closed)`.
 * - No state survives between calls; the same files and window always give
 *   the same result.
 * - `minDate` and `maxDate` are both null or both set.
 */
import { fromUnixSeconds } from "../../utils/dates";
import { readSnapshotRecords, type QuestionRecord } from "../snapshots";
import type { TagAnalysisResult, TimeWindow } from "./types";
import { acceptInWindow } from "./window";

export function createEmptyResult(): TagAnalysisResult {
  return {
    total: 0,
    negative: 0,
    closed: 0,
    closedAndNegative: 0,
    minDate: null,
    maxDate: null,
  };
}

export const isClosed = (record: QuestionRecord): boolean => (record.closed_date ?? 0) > 0;

/**
 * Adds `record` to `result` when its creation date is inside `window`.
 *
 * @returns Whether the record was accepted.
 */
export function accumulate(
  result: TagAnalysisResult,
  record: QuestionRecord,
  window: TimeWindow,
): boolean {
  const itemDate = fromUnixSeconds(record.creation_date);
  if (!acceptInWindow(itemDate, window)) return false;

  const negative = record.score < 0;

  result.total++;
  if (negative) result.negative++;

  if (isClosed(record)) {
    result.closed++;
    if (negative) result.closedAndNegative++;
  }

  if (result.minDate === null || itemDate < result.minDate) {
    result.minDate = itemDate;
  }
  if (result.maxDate === null || itemDate > result.maxDate) {
    result.maxDate = itemDate;
  }
  return true;
}

/** Folds any record sequence; `analyzeTag` feeds it from disk. */
export async function analyzeRecords(
  records: AsyncIterable<QuestionRecord> | Iterable<QuestionRecord>,
  window: TimeWindow,
): Promise<TagAnalysisResult> {
  const result = createEmptyResult();
  for await (const record of records) {
    accumulate(result, record, window);
  }
  return result;
}

/**
 * Analyzes the snapshots stored under `baseDir/<tag>` for `window`.
 *
 * @throws SnapshotReadError | SnapshotParseError from the reader.
 */
export async function analyzeTag(
  baseDir: string,
  tag: string,
  window: TimeWindow,
): Promise<TagAnalysisResult> {
  return analyzeRecords(readSnapshotRecords(baseDir, tag), window);
}

/** A window and the result folded for it. */
export interface WindowResult<W extends TimeWindow> {
  readonly window: W;
  readonly result: TagAnalysisResult;
}

/**
 * Folds one pass over `records` into a separate result per window. A record
 * is counted in every window that accepts it, so overlapping bounds count it
 * more than once. Results follow the order of `windows`.
 */
export async function analyzeRecordsByWindow<W extends TimeWindow>(
  records: AsyncIterable<QuestionRecord> | Iterable<QuestionRecord>,
  windows: readonly W[],
): Promise<WindowResult<W>[]> {
  const slots = windows.map((window) => ({ window, result: createEmptyResult() }));
  for await (const record of records) {
    for (const slot of slots) {
      accumulate(slot.result, record, slot.window);
    }
  }
  return slots;
}

/**
 * Reads the snapshots of `tag` once and analyzes them for every window.
 *
 * @throws SnapshotReadError | SnapshotParseError from the reader.
 */
export async function analyzeTagWindows<W extends TimeWindow>(
  baseDir: string,
  tag: string,
  windows: readonly W[],
): Promise<WindowResult<W>[]> {
  return analyzeRecordsByWindow(readSnapshotRecords(baseDir, tag), windows);
}
