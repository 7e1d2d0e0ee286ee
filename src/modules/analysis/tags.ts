import { readdir } from "node:fs/promises";
import { SnapshotReadError } from "../snapshots";

/**
 * Lists the tags stored under `baseDir`: its immediate subdirectories, sorted
 * by name. Files next to them are ignored.
 *
 * @throws SnapshotReadError when `baseDir` cannot be listed.
 */
export async function discoverTags(baseDir: string): Promise<string[]> {
  try {
    const entries = await readdir(baseDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotReadError(`Cannot list base directory ${baseDir}`, [
      `${baseDir}: ${reason}`,
    ]);
  }
}
