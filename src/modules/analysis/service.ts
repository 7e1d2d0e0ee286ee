/**
 * Analysis Service.
 *
 * Purpose: Drive the aggregator for a set of tags and print one CSV section per
 * tag.
 * Context: Backs the `analyze` command.
 *
 * Invariants:
 * - Tags are processed in the given order; output follows that order.
 * - The first failure stops the run; lines already written stay written.
 * - By-month mode reads the snapshots of a tag once and folds every record
 *   into each bucket that accepts it; buckets print in order.
 */
import { createLogger } from "../../utils/logger";
import { ErrResult, OkResult, toError, type Result } from "../../utils/result";
import { analyzeTag, analyzeTagWindows } from "./aggregator";
import { formatResultLine, formatTagHeader, resolveLabel } from "./format";
import { monthBuckets } from "./months";
import { discoverTags } from "./tags";
import type { LabeledResult, OutputWriter, TimeWindow } from "./types";

const log = createLogger("AnalysisService");

export interface AnalyzeInput {
  readonly baseDir: string;
  /** Explicit tags; null or empty means discover them under `baseDir`. */
  readonly tags: readonly string[] | null;
  readonly window: TimeWindow;
  readonly byMonth: boolean;
}

export interface AnalysisSummary {
  readonly tags: readonly string[];
  /** Result lines written, headers excluded. */
  readonly resultLines: number;
}

export class AnalysisService {
  async resolveTags(
    baseDir: string,
    tags: readonly string[] | null,
  ): Promise<Result<string[], Error>> {
    if (tags !== null && tags.length > 0) {
      return OkResult([...tags]);
    }
    try {
      const discovered = await discoverTags(baseDir);
      log.debug(`Discovered ${discovered.length} tag(s) in ${baseDir}`);
      return OkResult(discovered);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async runSingleWindow(
    baseDir: string,
    tag: string,
    window: TimeWindow,
  ): Promise<Result<LabeledResult, Error>> {
    try {
      const result = await analyzeTag(baseDir, tag, window);
      return OkResult({ label: resolveLabel(window.to, result), result });
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async runByMonth(
    baseDir: string,
    tag: string,
    window: TimeWindow,
  ): Promise<Result<LabeledResult[], Error>> {
    try {
      const buckets = monthBuckets(window.from, window.to);
      const folded = await analyzeTagWindows(baseDir, tag, buckets);
      return OkResult(folded.map(({ window: bucket, result }) => ({ label: bucket.to, result })));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  private async runWindowAsLines(
    baseDir: string,
    tag: string,
    window: TimeWindow,
  ): Promise<Result<LabeledResult[], Error>> {
    const single = await this.runSingleWindow(baseDir, tag, window);
    if (single.isErr()) return ErrResult(single.error);
    return OkResult([single.unwrap()]);
  }

  async run(input: AnalyzeInput, write: OutputWriter): Promise<Result<AnalysisSummary, Error>> {
    const tagsResult = await this.resolveTags(input.baseDir, input.tags);
    if (tagsResult.isErr()) return ErrResult(tagsResult.error);
    const tags = tagsResult.unwrap();

    log.info(
      `Analyzing ${tags.length} tag(s) in ${input.baseDir}${input.byMonth ? " by month" : ""}`,
    );

    let resultLines = 0;
    for (const tag of tags) {
      formatTagHeader(tag).forEach((line) => write(line));

      const linesResult = input.byMonth
        ? await this.runByMonth(input.baseDir, tag, input.window)
        : await this.runWindowAsLines(input.baseDir, tag, input.window);

      if (linesResult.isErr()) {
        log.error(`Failed to analyze tag '${tag}'`);
        return ErrResult(linesResult.error);
      }

      for (const { label, result } of linesResult.unwrap()) {
        write(formatResultLine(label, result));
        resultLines++;
      }
    }

    return OkResult({ tags, resultLines });
  }
}

export const analysisService = new AnalysisService();
