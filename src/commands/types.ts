import type { EnvConfig } from "../configuration/env";
import type { OutputWriter } from "../modules/analysis/types";
import type { FetcherService } from "../modules/fetcher/service";
import type { AnalysisService } from "../modules/analysis/service";

/** What a command receives from the CLI runner. */
export interface CommandContext {
  /** Arguments after the command name. */
  readonly argv: readonly string[];
  readonly env: EnvConfig;
  /** Result output (stdout in the CLI). */
  readonly write: OutputWriter;
  readonly analysis: AnalysisService;
  readonly fetcher: FetcherService;
}

export interface Command {
  readonly name: string;
  readonly description: string;
  /** Resolves to the process exit status. */
  run(ctx: CommandContext): Promise<number>;
}
