import { describe, expect, it } from "vitest";
import { Err, ErrResult, Ok, OkResult, toError } from "@/utils/result";
import { UsageError } from "@/utils/errors";

describe("Result", () => {
  it("unwraps the value of a success", () => {
    const result = OkResult<number>(3);
    expect(result).toBeInstanceOf(Ok);
    expect(result.isOk()).toBe(true);
    expect(result.isErr()).toBe(false);
    expect(result.unwrap()).toBe(3);
  });

  it("throws the contained error when a failure is unwrapped", () => {
    const error = new UsageError("-dir is required (or set SNAPSHOT_DIR)");
    const result = ErrResult<number>(error);
    expect(result).toBeInstanceOf(Err);
    expect(result.isErr() && result.error).toBe(error);
    expect(() => result.unwrap()).toThrow(error);
  });

  it("exposes only the guards and unwrap", () => {
    const methods = (value: object): string[] =>
      Object.getOwnPropertyNames(Object.getPrototypeOf(value)).sort();
    expect(methods(OkResult(1))).toEqual(["constructor", "isErr", "isOk", "unwrap"]);
    expect(methods(ErrResult(new Error("x")))).toEqual(["constructor", "isErr", "isOk", "unwrap"]);
  });
});

describe("toError", () => {
  it("keeps errors and wraps anything else", () => {
    const error = new Error("boom");
    expect(toError(error)).toBe(error);
    expect(toError("disk full").message).toBe("disk full");
  });
});
