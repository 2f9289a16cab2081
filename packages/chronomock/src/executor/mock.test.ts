/**
 * Tests for executor/mock.ts - MockSpawner
 */
import { describe, it, expect, vi } from "vitest";
import { MockSpawner } from "./mock";
import { task } from "./task";
import { ok, err, unwrap } from "../result";
import { VerificationError } from "../errors";
import { releasePending, withVerification } from "../verify";

const exampleTask = task(async () => {}, { name: "example" });

describe("MockSpawner", () => {
  it("can spawn a single task", () => {
    const spawner = MockSpawner.expect(1);
    unwrap(spawner.spawn(exampleTask()));

    expect(() => spawner.release()).not.toThrow();
  });

  it("can spawn multiple tasks", () => {
    const spawner = MockSpawner.expect(3);
    unwrap(spawner.spawn(exampleTask()));
    unwrap(spawner.spawn(exampleTask()));
    unwrap(spawner.spawn(exampleTask()));

    expect(spawner.timesCalled).toBe(3);
    expect(spawner.check()).toEqual(ok(undefined));
  });

  it("throws on release after spawning too many tasks", () => {
    const spawner = MockSpawner.expect(1);
    spawner.spawn(exampleTask());
    spawner.spawn(exampleTask());
    spawner.spawn(exampleTask());

    expect(() => spawner.release()).toThrow("expected to spawn 1 task(s), actually spawned 3");
  });

  it("throws on release after spawning too few tasks", () => {
    const spawner = MockSpawner.expect(3);
    spawner.spawn(exampleTask());

    expect(() => spawner.release()).toThrow(VerificationError);
    expect(spawner.expected).toBe(3);
  });

  it("returns a mismatch from check() instead of throwing", () => {
    const spawner = MockSpawner.expect(2);
    spawner.spawn(exampleTask());

    expect(spawner.check()).toEqual(
      err({ type: "WRONG_NUMBER_OF_SPAWNS", expected: 2, actual: 1 })
    );
    expect(() => spawner.release()).not.toThrow();
  });

  it("never runs the spawned work", async () => {
    const body = vi.fn(async () => {});
    const tracked = task(body, { name: "tracked" });
    const spawner = MockSpawner.expect(2);

    const first = tracked();
    spawner.spawn(first);
    spawner.spawn(tracked());
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(body).not.toHaveBeenCalled();
    expect(first.state).toBe("forgotten");
    expect(tracked.running()).toBe(0);
    spawner.check();
  });

  it("counts empty tokens like any other", () => {
    const single = task(async () => {}, { name: "single" });
    const spawner = MockSpawner.expect(2);

    const held = single();
    const empty = single();
    spawner.spawn(empty);
    spawner.spawn(held);

    expect(empty.isEmpty).toBe(true);
    expect(spawner.check()).toEqual(ok(undefined));
  });

  it("is released by a verification scope", async () => {
    await expect(
      withVerification((scope) => {
        const spawner = scope.track(MockSpawner.expect(2));
        spawner.spawn(exampleTask());
      })
    ).rejects.toThrow("expected to spawn 2 task(s), actually spawned 1");
  });

  it("fails at the end of the test when it was never checked or released", () => {
    MockSpawner.expect(2);

    expect(() => releasePending()).toThrow("expected to spawn 2 task(s), actually spawned 0");
  });
});
