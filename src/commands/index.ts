/**
 * Command registry and CLI runner.
 */
import { CommandName, DEFAULT_COMMAND, USAGE } from "../configuration/constants";
import { loadEnv } from "../configuration/env";
import { analysisService, type AnalysisService } from "../modules/analysis/service";
import type { OutputWriter } from "../modules/analysis/types";
import { fetcherService, type FetcherService } from "../modules/fetcher/service";
import { UsageError } from "../utils/errors";
import { createLogger, setLogLevel } from "../utils/logger";
import { analyzeCommand } from "./analyze";
import { reportFailure } from "./failure";
import { fetchCommand } from "./fetch";
import type { Command } from "./types";

export type { Command, CommandContext } from "./types";
export { analyzeCommand, fetchCommand };

const log = createLogger("cli");

export const commands: ReadonlyMap<string, Command> = new Map(
  [analyzeCommand, fetchCommand].map((command): [string, Command] => [command.name, command]),
);

const HELP_DESCRIPTION = "Print this help";

/** Usage text followed by one line per command, built from the registry. */
export function formatHelp(registry: ReadonlyMap<string, Command> = commands): string {
  const entries: [string, string][] = [
    ...[...registry.values()].map((command): [string, string] => [command.name, command.description]),
    [CommandName.Help, HELP_DESCRIPTION],
  ];
  const width = Math.max(...entries.map(([name]) => name.length));
  return [
    USAGE,
    "",
    "Commands:",
    ...entries.map(([name, description]) => `  ${name.padEnd(width)}  ${description}`),
  ].join("\n");
}

export interface CliDeps {
  readonly env: Record<string, string | undefined>;
  readonly write: OutputWriter;
  readonly analysis: AnalysisService;
  readonly fetcher: FetcherService;
}

const defaultDeps = (): CliDeps => ({
  env: process.env,
  write: (line) => process.stdout.write(`${line}\n`),
  analysis: analysisService,
  fetcher: fetcherService,
});

/** Splits `argv` into a command name and its flags. */
export function selectCommand(argv: readonly string[]): { name: string; rest: string[] } {
  const [first, ...rest] = argv;
  if (first === undefined || first.startsWith("-")) {
    return { name: DEFAULT_COMMAND, rest: [...argv] };
  }
  return { name: first, rest };
}

/** Runs one CLI invocation and resolves to its exit status. */
export async function runCli(
  argv: readonly string[],
  deps: Partial<CliDeps> = {},
): Promise<number> {
  const { env, write, analysis, fetcher } = { ...defaultDeps(), ...deps };

  const envResult = loadEnv(env);
  if (envResult.isErr()) return reportFailure(log, envResult.error);
  const config = envResult.unwrap();
  setLogLevel(config.LOG_LEVEL);

  const { name, rest } = selectCommand(argv);
  if (name === CommandName.Help) {
    write(formatHelp());
    return 0;
  }

  const command = commands.get(name);
  if (!command) {
    return reportFailure(log, new UsageError(`Unknown command '${name}'`));
  }

  return command.run({ argv: rest, env: config, write, analysis, fetcher });
}
