/**
 * Tests for errors.ts
 */
import { describe, it, expect } from "vitest";
import {
  VerificationError,
  CounterOverflowError,
  VerifierConsumedError,
  SpawnTokenConsumedError,
  isCallCountMismatch,
  isSpawnError,
  isVerificationError,
} from "./errors";

describe("errors", () => {
  it("VerificationError exposes the mismatch", () => {
    const error = new VerificationError("expected to spawn 2 task(s), actually spawned 1", {
      type: "WRONG_NUMBER_OF_SPAWNS",
      expected: 2,
      actual: 1,
    });

    expect(error.name).toBe("VerificationError");
    expect(error.expected).toBe(2);
    expect(error.actual).toBe(1);
    expect(error instanceof Error).toBe(true);
    expect(isVerificationError(error)).toBe(true);
    expect(isVerificationError(new Error("other"))).toBe(false);
  });

  it("names the thrown errors", () => {
    expect(new CounterOverflowError(9).message).toBe("Call counter overflowed at 9");
    expect(new VerifierConsumedError("WRONG_NUMBER_OF_TICKS", "check").message).toBe(
      "Verifier WRONG_NUMBER_OF_TICKS was already finalized; check() is not allowed"
    );
    expect(new SpawnTokenConsumedError("blink", "spawned").name).toBe("SpawnTokenConsumedError");
  });

  it("recognises call count mismatches", () => {
    expect(isCallCountMismatch({ type: "WRONG_NUMBER_OF_TICKS", expected: 1, actual: 0 })).toBe(true);
    expect(isCallCountMismatch({ type: "WRONG_NUMBER_OF_TICKS", expected: 1 })).toBe(false);
    expect(isCallCountMismatch("EMPTY")).toBe(false);
  });

  it("recognises spawn errors", () => {
    expect(isSpawnError({ type: "SPAWN_BUSY", taskName: "blink" })).toBe(true);
    expect(isSpawnError({ type: "WRONG_NUMBER_OF_SPAWNS" })).toBe(false);
    expect(isSpawnError(null)).toBe(false);
  });
});
