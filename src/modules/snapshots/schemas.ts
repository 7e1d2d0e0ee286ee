import { z } from "zod";

/**
 * One question as returned by the `/questions` endpoint.
 *
 * Only the fields the analysis reads are validated; the rest (tags, owner,
 * title, link, ...) pass through untouched. A `closed_date` that is absent,
 * null or 0 means the question is open.
 */
export const QuestionRecordSchema = z
  .object({
    creation_date: z.number().int(),
    closed_date: z.number().int().nullish(),
    score: z.number().int(),
  })
  .passthrough();

export type QuestionRecord = z.infer<typeof QuestionRecordSchema>;

/** One saved page of API results. */
export const SnapshotFileSchema = z
  .object({
    items: z.array(QuestionRecordSchema),
    has_more: z.boolean().optional(),
    quota_max: z.number().int().optional(),
    quota_remaining: z.number().int().optional(),
    total: z.number().int().optional(),
  })
  .passthrough();

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export const SNAPSHOT_FILE_EXTENSION = ".json";
