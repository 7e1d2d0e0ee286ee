/**
 * Snapshot Store Reader.
 *
 * Purpose: Stream the question records saved under `baseDir/<tag>/*.json`.
 * Context: Feeds the tag aggregator; the fetcher writes the same layout.
 *
 * Invariants:
 * - Only entries whose name ends in `.json` and that are files are read.
 * - Files are visited in name order; the aggregation does not depend on it.
 * - The first unreadable or invalid file ends the sequence with an error.
 */
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { DetailedError, UsageError } from "../../utils/errors";
import {
  SNAPSHOT_FILE_EXTENSION,
  SnapshotFileSchema,
  type QuestionRecord,
  type SnapshotFile,
} from "./schemas";

export class SnapshotReadError extends DetailedError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, details);
    this.name = "SnapshotReadError";
  }
}

export class SnapshotParseError extends DetailedError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, details);
    this.name = "SnapshotParseError";
  }
}

export function formatZodIssues(issues: readonly z.ZodIssue[], file: string): string[] {
  return issues.map((issue) => {
    const jsonPath = issue.path.length
      ? `$.${issue.path
          .map((part) => (typeof part === "number" ? `[${part}]` : String(part)))
          .join(".")
          .replace(/\.\[/g, "[")}`
      : "$";
    return `${file} ${jsonPath}: ${issue.message}`;
  });
}

const reasonOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * A tag names exactly one directory below the base directory: no separators
 * and no `.` or `..`.
 */
export function isValidTagName(tag: string): boolean {
  return tag.length > 0 && tag !== "." && tag !== ".." && !/[/\\]/.test(tag);
}

export const invalidTagMessage = (tag: string): string =>
  `Invalid tag '${tag}': a tag must not be '.' or '..' or contain '/' or '\\'`;

/**
 * Directory holding the snapshots of one tag.
 *
 * @throws UsageError when `tag` would resolve outside `baseDir/<tag>`.
 */
export function tagDirectory(baseDir: string, tag: string): string {
  if (!isValidTagName(tag)) {
    throw new UsageError(invalidTagMessage(tag));
  }
  return path.join(baseDir, tag);
}

/**
 * Parses the raw text of one snapshot file.
 *
 * @throws SnapshotParseError when the text is not JSON or does not match the
 * snapshot schema.
 */
export function parseSnapshot(rawContent: string, filePath: string): SnapshotFile {
  let raw: unknown;
  try {
    raw = JSON.parse(rawContent);
  } catch (error) {
    throw new SnapshotParseError(`Failed to parse snapshot file ${filePath}`, [
      `${filePath}: ${reasonOf(error)}`,
    ]);
  }

  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotParseError(
      `Invalid snapshot file ${filePath}`,
      formatZodIssues(parsed.error.issues, filePath),
    );
  }
  return parsed.data;
}

/**
 * Lists the snapshot files of a tag directory, sorted by name.
 *
 * @throws SnapshotReadError when the directory cannot be listed.
 */
export async function listSnapshotFiles(dirName: string): Promise<string[]> {
  try {
    const entries = await readdir(dirName, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(SNAPSHOT_FILE_EXTENSION))
      .map((entry) => path.join(dirName, entry.name))
      .sort();
  } catch (error) {
    throw new SnapshotReadError(`Cannot list snapshot directory ${dirName}`, [
      `${dirName}: ${reasonOf(error)}`,
    ]);
  }
}

/**
 * Yields every question record stored for `tag`, page after page.
 *
 * The sequence is lazy: a file is read only when the previous one has been
 * consumed. It cannot be restarted; call again for a fresh pass.
 */
export async function* readSnapshotRecords(
  baseDir: string,
  tag: string,
): AsyncGenerator<QuestionRecord, void, undefined> {
  const files = await listSnapshotFiles(tagDirectory(baseDir, tag));

  for (const filePath of files) {
    let rawContent: string;
    try {
      rawContent = await readFile(filePath, "utf8");
    } catch (error) {
      throw new SnapshotReadError(`Cannot read snapshot file ${filePath}`, [
        `${filePath}: ${reasonOf(error)}`,
      ]);
    }

    yield* parseSnapshot(rawContent, filePath).items;
  }
}
