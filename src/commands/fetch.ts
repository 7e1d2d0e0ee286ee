/**
 * Fetch Command.
 *
 * Purpose: Save every `/questions` page of the requested tags under `-dir`.
 */
import { CommandName } from "../configuration/constants";
import { parseFetchOptions } from "../configuration/definitions";
import { createLogger } from "../utils/logger";
import { reportFailure } from "./failure";
import type { Command } from "./types";

const log = createLogger(CommandName.Fetch);

export const fetchCommand: Command = {
  name: CommandName.Fetch,
  description: "Download question pages into per-tag directories",
  async run(ctx) {
    const options = parseFetchOptions(ctx.argv, ctx.env);
    if (options.isErr()) return reportFailure(log, options.error);

    const input = options.unwrap();
    if (input.apiKey === null) {
      log.warn("STACK_KEY is not set; requests use the anonymous quota");
    }

    const result = await ctx.fetcher.fetchTags(input);
    if (result.isErr()) return reportFailure(log, result.error);

    const pages = result.unwrap().reduce((sum, summary) => sum + summary.pages, 0);
    log.info(`Done: ${pages} page(s) saved under ${input.baseDir}`);
    return 0;
  },
};
