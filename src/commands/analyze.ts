/**
 * Analyze Command.
 *
 * Purpose: Print negative, closed and closed-and-negative ratios per tag, for
 * one window or per calendar month.
 */
import { CommandName } from "../configuration/constants";
import { parseAnalyzeOptions } from "../configuration/definitions";
import { createLogger } from "../utils/logger";
import { reportFailure } from "./failure";
import type { Command } from "./types";

const log = createLogger(CommandName.Analyze);

export const analyzeCommand: Command = {
  name: CommandName.Analyze,
  description: "Compute question ratios from saved snapshots",
  async run(ctx) {
    const options = parseAnalyzeOptions(ctx.argv, ctx.env);
    if (options.isErr()) return reportFailure(log, options.error);

    const result = await ctx.analysis.run(options.unwrap(), ctx.write);
    if (result.isErr()) return reportFailure(log, result.error);

    const summary = result.unwrap();
    log.debug(`${summary.resultLines} line(s) for ${summary.tags.length} tag(s)`);
    return 0;
  },
};
