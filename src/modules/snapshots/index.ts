/**
 * Snapshot Store.
 *
 * Purpose: Layout, schema and reader of the saved API pages.
 */

export {
  readSnapshotRecords,
  listSnapshotFiles,
  parseSnapshot,
  tagDirectory,
  isValidTagName,
  invalidTagMessage,
  formatZodIssues,
  SnapshotReadError,
  SnapshotParseError,
} from "./reader";

export {
  QuestionRecordSchema,
  SnapshotFileSchema,
  SNAPSHOT_FILE_EXTENSION,
  type QuestionRecord,
  type SnapshotFile,
} from "./schemas";
