/**
 * Tag aggregator tests.
 *
 * Purpose: Counters, min/max dates and failure modes of `analyzeTag` over real
 * snapshot trees in a temp directory.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  analyzeRecords,
  analyzeRecordsByWindow,
  analyzeTag,
  analyzeTagWindows,
  formatResultLine,
  toReport,
  UNBOUNDED_WINDOW,
} from "@/modules/analysis";
import { SnapshotParseError, SnapshotReadError } from "@/modules/snapshots";
import { question, SnapshotTree, unix, utc, type FakeQuestion } from "../_utils/snapshots";

describe("analyzeTag", () => {
  let tree: SnapshotTree;

  beforeEach(async () => {
    tree = await SnapshotTree.create();
  });

  afterEach(async () => {
    await tree.dispose();
  });

  it("folds records across snapshot files", async () => {
    await tree.page("go", "so001.json", [question("2023-11-10", -1, 0), question("2023-11-15", 5, 0)], true);
    await tree.page("go", "so002.json", [question("2023-11-20", -3, 1700000000)]);

    const window = { from: utc("2023-11-01"), to: utc("2023-12-01") };
    const result = await analyzeTag(tree.baseDir, "go", window);

    expect(result.total).toBe(3);
    expect(result.negative).toBe(2);
    expect(result.closed).toBe(1);
    expect(result.closedAndNegative).toBe(1);
    expect(result.minDate?.toISOString()).toBe("2023-11-10T00:00:00.000Z");
    expect(result.maxDate?.toISOString()).toBe("2023-11-20T00:00:00.000Z");
    expect(formatResultLine(window.to, result)).toBe("2023-12-01,3,0.667,0.333,0.333");
  });

  it("keeps the counter invariants", async () => {
    await tree.page("rust", "so001.json", [
      question("2022-05-01", -2, unix("2022-05-03")),
      question("2022-05-02", -1),
      question("2022-05-03", 0, unix("2022-05-04")),
      question("2022-05-04", 3, unix("2022-05-05")),
      question("2022-05-05", -7, unix("2022-05-06")),
    ]);

    const result = await analyzeTag(tree.baseDir, "rust", UNBOUNDED_WINDOW);

    expect(result.total).toBe(5);
    expect(result.negative).toBe(3);
    expect(result.closed).toBe(4);
    expect(result.closedAndNegative).toBe(2);
    expect(result.negative).toBeLessThanOrEqual(result.total);
    expect(result.closed).toBeLessThanOrEqual(result.total);
    expect(result.closedAndNegative).toBeLessThanOrEqual(Math.min(result.negative, result.closed));
  });

  it("gives the same result on every run", async () => {
    await tree.page("go", "so001.json", [question("2023-11-10", -1), question("2023-11-15", 2)]);
    const window = { from: utc("2023-11-01"), to: null };

    const first = await analyzeTag(tree.baseDir, "go", window);
    const second = await analyzeTag(tree.baseDir, "go", window);

    expect(second).toEqual(first);
  });

  it("includes records on the bounds and drops those a day outside", async () => {
    await tree.page("go", "so001.json", [
      question("2021-01-01", 1),
      question("2021-02-01", 1),
      question("2020-12-31", 1),
      question("2021-02-02", 1),
    ]);

    const result = await analyzeTag(tree.baseDir, "go", {
      from: utc("2021-01-01"),
      to: utc("2021-02-01"),
    });

    expect(result.total).toBe(2);
    expect(result.minDate?.toISOString()).toBe("2021-01-01T00:00:00.000Z");
    expect(result.maxDate?.toISOString()).toBe("2021-02-01T00:00:00.000Z");
  });

  it("treats a missing or zero closed_date as open", async () => {
    await tree.page("go", "so001.json", [question("2021-01-05", -1), question("2021-01-06", -1, 0)]);

    const result = await analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW);

    expect(result.closed).toBe(0);
    expect(result.closedAndNegative).toBe(0);
    expect(result.negative).toBe(2);
  });

  it("reads a null closed_date as open", async () => {
    await tree.raw(
      "go/so001.json",
      JSON.stringify({
        items: [
          { creation_date: unix("2021-01-05"), closed_date: null, score: -2 },
          { creation_date: unix("2021-01-06"), closed_date: unix("2021-01-07"), score: -1 },
        ],
        has_more: false,
      }),
    );

    const result = await analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW);

    expect(result.total).toBe(2);
    expect(result.closed).toBe(1);
    expect(result.closedAndNegative).toBe(1);
  });

  it("reports an empty directory as an empty result", async () => {
    await tree.tag("go");

    const result = await analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW);

    expect(result.total).toBe(0);
    expect(result.minDate).toBeNull();
    expect(result.maxDate).toBeNull();
    expect(toReport(result)).toEqual({ kind: "empty", total: 0 });
  });

  it("ignores entries that are not json files", async () => {
    await tree.page("go", "so001.json", [question("2021-01-05", 1)]);
    await tree.raw("go/notes.txt", "not a snapshot");
    await tree.raw("go/old.json/so001.json", JSON.stringify({ items: [question("2021-01-05", 1)] }));

    const result = await analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW);

    expect(result.total).toBe(1);
  });

  it("fails when the tag directory does not exist", async () => {
    await expect(analyzeTag(tree.baseDir, "missing", UNBOUNDED_WINDOW)).rejects.toBeInstanceOf(
      SnapshotReadError,
    );
  });

  it("fails on a file that is not json", async () => {
    await tree.raw("go/so001.json", "{ broken");

    await expect(analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW)).rejects.toBeInstanceOf(
      SnapshotParseError,
    );
  });

  it("names the offending field of a schema mismatch", async () => {
    const filePath = await tree.raw(
      "go/so001.json",
      JSON.stringify({ items: [{ creation_date: 1612137600, score: "high" }], has_more: false }),
    );

    const error = await analyzeTag(tree.baseDir, "go", UNBOUNDED_WINDOW).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SnapshotParseError);
    if (!(error instanceof SnapshotParseError)) return;
    expect(error.message).toBe(`Invalid snapshot file ${filePath}`);
    expect(error.details).toEqual([`${filePath} $.items[0].score: Expected number, received string`]);
  });
});

describe("analyzeRecords", () => {
  it("folds an in-memory sequence", async () => {
    const result = await analyzeRecords(
      [question("2021-01-05", -4, unix("2021-01-06")), question("2021-01-03", 1)],
      UNBOUNDED_WINDOW,
    );

    expect(result.total).toBe(2);
    expect(result.closedAndNegative).toBe(1);
    expect(result.minDate?.toISOString()).toBe("2021-01-03T00:00:00.000Z");
    expect(result.maxDate?.toISOString()).toBe("2021-01-05T00:00:00.000Z");
  });
});

describe("analyzeRecordsByWindow", () => {
  const buckets = [
    { from: utc("2021-01-01"), to: utc("2021-02-01") },
    { from: utc("2021-02-01"), to: utc("2021-03-01") },
  ];
  const records = [
    question("2021-01-15", -1),
    question("2021-02-01", 2, unix("2021-02-03")),
    question("2021-02-10", 1),
    question("2021-03-02", -5),
  ];

  it("pulls each record once and counts boundary records in both buckets", async () => {
    let pulled = 0;
    function* counted(): Generator<FakeQuestion> {
      for (const record of records) {
        pulled++;
        yield record;
      }
    }

    const folded = await analyzeRecordsByWindow(counted(), buckets);

    expect(pulled).toBe(4);
    expect(folded.map(({ window }) => window)).toEqual(buckets);
    expect(folded.map(({ result }) => [result.total, result.negative, result.closed])).toEqual([
      [2, 1, 1],
      [2, 0, 1],
    ]);
  });

  it("matches a separate fold per bucket", async () => {
    const folded = await analyzeRecordsByWindow(records, buckets);
    const separate = await Promise.all(buckets.map((bucket) => analyzeRecords(records, bucket)));

    expect(folded.map(({ result }) => result)).toEqual(separate);
  });
});

describe("analyzeTagWindows", () => {
  let tree: SnapshotTree;

  beforeEach(async () => {
    tree = await SnapshotTree.create();
  });

  afterEach(async () => {
    await tree.dispose();
  });

  it("folds every snapshot file into each window", async () => {
    await tree.page("go", "so001.json", [question("2021-01-10", -1)], true);
    await tree.page("go", "so002.json", [question("2021-02-10", -2, unix("2021-02-11"))]);

    const folded = await analyzeTagWindows(tree.baseDir, "go", [
      { from: utc("2021-01-01"), to: utc("2021-02-01") },
      UNBOUNDED_WINDOW,
    ]);

    expect(folded.map(({ result }) => [result.total, result.closedAndNegative])).toEqual([
      [1, 0],
      [2, 1],
    ]);
  });
});
