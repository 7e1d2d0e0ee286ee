/**
 * Environment configuration.
 *
 * Role in system:
 * - `.env` is loaded by the CLI entrypoint (`dotenv/config`) before this runs.
 * - Values are validated once; callers receive a typed snapshot.
 *
 * Gotchas:
 * - Empty strings count as unset, so `STACK_KEY=` in `.env` sends no key.
 */
import { z } from "zod";
import { DEFAULT_API_URL } from "../modules/fetcher/types";
import { UsageError } from "../utils/errors";
import { ErrResult, OkResult, type Result } from "../utils/result";

const emptyAsUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

export const EnvSchema = z.object({
  /** Default for `-dir`. */
  SNAPSHOT_DIR: z.preprocess(emptyAsUndefined, z.string().optional()),
  /** API key sent by the fetcher for a larger quota. */
  STACK_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  STACK_API_URL: z.preprocess(emptyAsUndefined, z.string().url().default(DEFAULT_API_URL)),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): Result<EnvConfig, UsageError> {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    return ErrResult(
      new UsageError(
        "Invalid environment",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      ),
    );
  }
  return OkResult(parsed.data);
}
