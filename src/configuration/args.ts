/**
 * Flag tokenizing.
 *
 * `node:util` `parseArgs` only knows `--long` flags; single-dash long flags
 * (`-dir`, `-bymonth=`) are rewritten to the double-dash form first.
 */
import { parseArgs, type ParseArgsConfig } from "node:util";
import { UsageError } from "../utils/errors";
import { ErrResult, OkResult, type Result } from "../utils/result";

const SINGLE_DASH_LONG_FLAG = /^-[A-Za-z][A-Za-z0-9-]+(=.*)?$/;

export function normalizeFlags(argv: readonly string[]): string[] {
  return argv.map((arg) => (SINGLE_DASH_LONG_FLAG.test(arg) ? `-${arg}` : arg));
}

export const ANALYZE_FLAGS = {
  dir: { type: "string" },
  fromdate: { type: "string" },
  todate: { type: "string" },
  tags: { type: "string" },
  bymonth: { type: "boolean" },
} satisfies ParseArgsConfig["options"];

export const FETCH_FLAGS = {
  dir: { type: "string" },
  fromdate: { type: "string" },
  todate: { type: "string" },
  tags: { type: "string" },
  site: { type: "string" },
  pagesize: { type: "string" },
} satisfies ParseArgsConfig["options"];

/** Runs `parseArgs`, turning its unknown-flag errors into `UsageError`. */
export function tokenizeFlags<T>(parse: () => T): Result<T, UsageError> {
  try {
    return OkResult(parse());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return ErrResult(new UsageError(reason));
  }
}

export function tokenizeAnalyzeFlags(argv: readonly string[]) {
  return tokenizeFlags(
    () =>
      parseArgs({
        args: normalizeFlags(argv),
        options: ANALYZE_FLAGS,
        strict: true,
        allowPositionals: false,
      }).values,
  );
}

export function tokenizeFetchFlags(argv: readonly string[]) {
  return tokenizeFlags(
    () =>
      parseArgs({
        args: normalizeFlags(argv),
        options: FETCH_FLAGS,
        strict: true,
        allowPositionals: false,
      }).values,
  );
}
