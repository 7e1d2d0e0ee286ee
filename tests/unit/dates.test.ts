import { describe, expect, it } from "vitest";
import {
  addCalendarMonth,
  formatDateOnly,
  fromUnixSeconds,
  parseDateOnly,
  toUnixSeconds,
} from "@/utils/dates";

describe("parseDateOnly", () => {
  it("reads a day as midnight UTC", () => {
    expect(parseDateOnly("2021-02-01")?.toISOString()).toBe("2021-02-01T00:00:00.000Z");
  });

  it("rejects malformed text", () => {
    expect(parseDateOnly("2021-2-1")).toBeNull();
    expect(parseDateOnly("01/02/2021")).toBeNull();
    expect(parseDateOnly("")).toBeNull();
  });

  it("rejects days that do not exist", () => {
    expect(parseDateOnly("2021-02-30")).toBeNull();
    expect(parseDateOnly("2021-13-01")).toBeNull();
  });
});

describe("addCalendarMonth", () => {
  it("keeps the day of month", () => {
    expect(formatDateOnly(addCalendarMonth(new Date("2021-01-01T00:00:00Z")))).toBe("2021-02-01");
  });

  it("rolls over short months instead of clamping", () => {
    expect(formatDateOnly(addCalendarMonth(new Date("2021-01-31T00:00:00Z")))).toBe("2021-03-03");
    expect(formatDateOnly(addCalendarMonth(new Date("2020-01-31T00:00:00Z")))).toBe("2020-03-02");
  });

  it("crosses the year boundary", () => {
    expect(formatDateOnly(addCalendarMonth(new Date("2021-12-15T00:00:00Z")))).toBe("2022-01-15");
  });
});

describe("unix seconds", () => {
  it("converts both ways", () => {
    const date = fromUnixSeconds(1612137600);
    expect(date.toISOString()).toBe("2021-02-01T00:00:00.000Z");
    expect(toUnixSeconds(date)).toBe(1612137600);
  });
});
