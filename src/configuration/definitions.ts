/**
 * Command option schemas.
 *
 * Role in system:
 * - Turn tokenized flags plus the environment into the typed inputs of the
 *   analysis and fetcher services.
 *
 * Key invariants:
 * - Dates are strict `YYYY-MM-DD`, read as midnight UTC. An empty value is
 *   unset; anything else malformed is a usage error, never silently dropped.
 * - Tag lists drop empty entries (`-tags go,,rust` is `[go, rust]`); a list
 *   with no entry left counts as absent. A tag is a single directory name:
 *   `.`, `..` and names containing `/` or `\` are refused.
 * - `-bymonth` without both dates fails here, before any output is written.
 */
import { z } from "zod";
import type { AnalyzeInput } from "../modules/analysis/service";
import { invalidTagMessage, isValidTagName } from "../modules/snapshots";
import { DEFAULT_SITE, MAX_PAGE_SIZE, type FetchInput } from "../modules/fetcher/types";
import { parseDateOnly } from "../utils/dates";
import { UsageError } from "../utils/errors";
import { ErrResult, OkResult, type Result } from "../utils/result";
import { tokenizeAnalyzeFlags, tokenizeFetchFlags } from "./args";
import type { EnvConfig } from "./env";

export const DateFlagSchema = z
  .string()
  .optional()
  .transform((value, ctx): Date | null => {
    if (value === undefined || value === "") return null;
    const date = parseDateOnly(value);
    if (date === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a date in YYYY-MM-DD format, got '${value}'`,
      });
      return z.NEVER;
    }
    return date;
  });

export function splitTags(value: string): string[] {
  return value
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export const TagListSchema = z
  .string()
  .optional()
  .transform((value, ctx): string[] | null => {
    if (value === undefined) return null;
    const tags = splitTags(value);
    const invalid = tags.filter((tag) => !isValidTagName(tag));
    if (invalid.length > 0) {
      invalid.forEach((tag) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: invalidTagMessage(tag) }),
      );
      return z.NEVER;
    }
    return tags.length > 0 ? tags : null;
  });

const DirFlagSchema = z
  .string({ required_error: "-dir is required (or set SNAPSHOT_DIR)" })
  .min(1, "-dir is required (or set SNAPSHOT_DIR)");

export const AnalyzeOptionsSchema = z
  .object({
    dir: DirFlagSchema,
    fromdate: DateFlagSchema,
    todate: DateFlagSchema,
    tags: TagListSchema,
    bymonth: z.boolean().default(false),
  })
  .superRefine((value, ctx) => {
    if (value.bymonth && (value.fromdate === null || value.todate === null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["bymonth"],
        message: "-bymonth requires -fromdate and -todate",
      });
    }
  })
  .transform(
    (value): AnalyzeInput => ({
      baseDir: value.dir,
      tags: value.tags,
      window: { from: value.fromdate, to: value.todate },
      byMonth: value.bymonth,
    }),
  );

export const FetchOptionsSchema = z
  .object({
    dir: DirFlagSchema,
    fromdate: DateFlagSchema,
    todate: DateFlagSchema,
    tags: TagListSchema,
    site: z.string().min(1).default(DEFAULT_SITE),
    pagesize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
  })
  .transform((value, ctx) => {
    const { fromdate, todate, tags } = value;
    if (fromdate === null || todate === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "-fromdate and -todate are required for fetch",
      });
      return z.NEVER;
    }
    if (tags === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tags"],
        message: "-tags is required for fetch",
      });
      return z.NEVER;
    }
    return {
      dir: value.dir,
      from: fromdate,
      to: todate,
      tags,
      site: value.site,
      pageSize: value.pagesize,
    };
  });

export function formatOptionIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length && !issue.message.startsWith("-")
      ? `-${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}

function toUsageError(error: z.ZodError): UsageError {
  const details = formatOptionIssues(error.issues);
  return new UsageError(details[0] ?? "Invalid options", details);
}

export function parseAnalyzeOptions(
  argv: readonly string[],
  env: EnvConfig,
): Result<AnalyzeInput, UsageError> {
  const flags = tokenizeAnalyzeFlags(argv);
  if (flags.isErr()) return ErrResult(flags.error);

  const values = flags.unwrap();
  const parsed = AnalyzeOptionsSchema.safeParse({
    ...values,
    dir: values.dir ?? env.SNAPSHOT_DIR,
  });
  if (!parsed.success) return ErrResult(toUsageError(parsed.error));
  return OkResult(parsed.data);
}

export function parseFetchOptions(
  argv: readonly string[],
  env: EnvConfig,
): Result<FetchInput, UsageError> {
  const flags = tokenizeFetchFlags(argv);
  if (flags.isErr()) return ErrResult(flags.error);

  const values = flags.unwrap();
  const parsed = FetchOptionsSchema.safeParse({
    ...values,
    dir: values.dir ?? env.SNAPSHOT_DIR,
  });
  if (!parsed.success) return ErrResult(toUsageError(parsed.error));

  const options = parsed.data;
  return OkResult({
    baseDir: options.dir,
    tags: options.tags,
    from: options.from,
    to: options.to,
    site: options.site,
    pageSize: options.pageSize,
    apiKey: env.STACK_KEY ?? null,
    apiUrl: env.STACK_API_URL,
  });
}
