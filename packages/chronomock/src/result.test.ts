/**
 * Tests for result.ts
 */
import { describe, it, expect } from "vitest";
import {
  ok,
  err,
  unwrap,
  UnwrapError,
  type Result,
} from "./result";

describe("Result", () => {
  it("ok wraps a value", () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
  });

  it("err wraps an error and omits an absent cause", () => {
    expect(err("EMPTY")).toEqual({ ok: false, error: "EMPTY" });
    expect("cause" in err("EMPTY")).toBe(false);
  });

  it("err keeps a cause when given one", () => {
    const cause = new Error("boom");
    expect(err("FULL", { cause })).toEqual({ ok: false, error: "FULL", cause });
  });

  describe("unwrap", () => {
    it("returns the value of an Ok", () => {
      expect(unwrap(ok("value"))).toBe("value");
    });

    it("throws UnwrapError with the serialized error", () => {
      const result: Result<void, { type: string; expected: number }> = err({
        type: "WRONG_NUMBER_OF_SPAWNS",
        expected: 2,
      });

      expect(() => unwrap(result)).toThrow(UnwrapError);
      expect(() => unwrap(result)).toThrow(
        'Attempted to unwrap an Err: {"type":"WRONG_NUMBER_OF_SPAWNS","expected":2}'
      );
    });

    it("uses string errors as they are", () => {
      expect(() => unwrap(err("EMPTY"))).toThrow("Attempted to unwrap an Err: EMPTY");
    });
  });
});
