/**
 * Command names and configuration defaults.
 *
 * Invariants:
 * - Command names are the public CLI surface; renaming breaks scripts.
 */
export enum CommandName {
  Analyze = "analyze",
  Fetch = "fetch",
  Help = "help",
}

/** Command used when the first argument is a flag. */
export const DEFAULT_COMMAND = CommandName.Analyze;

/** Exit statuses of the CLI. */
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage:
  question-sentiment analyze -dir <path> [-fromdate YYYY-MM-DD] [-todate YYYY-MM-DD] [-tags a,b] [-bymonth]
  question-sentiment fetch -dir <path> -fromdate YYYY-MM-DD -todate YYYY-MM-DD -tags a,b [-site name] [-pagesize n]

Flags take one or two leading dashes. -dir falls back to SNAPSHOT_DIR.`;
