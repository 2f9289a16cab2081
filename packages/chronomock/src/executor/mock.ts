/**
 * A mocked spawner for unit tests.
 *
 * Tokens handed to `spawn()` are forgotten, never run, and every call is
 * counted against the expectation given to `MockSpawner.expect(n)`.
 *
 * @example
 * ```typescript
 * function spawnTasks(spawner: Spawner) {
 *   unwrap(spawner.spawn(blink()));
 *   unwrap(spawner.spawn(report(Duration.seconds(5))));
 * }
 *
 * const spawner = MockSpawner.expect(2);
 * spawnTasks(spawner);
 * expect(spawner.check()).toEqual(ok(undefined));
 * ```
 */

import { ok, type Result } from "../result";
import type { CallCountMismatch, SpawnError } from "../errors";
import { CallVerifier, type Verifiable } from "../verify";
import type { Spawner } from "./spawner";
import type { SpawnToken } from "./task";

export type MockSpawnerError = CallCountMismatch<"WRONG_NUMBER_OF_SPAWNS">;

export class MockSpawner implements Spawner, Verifiable<MockSpawnerError> {
  private constructor(private readonly verifier: CallVerifier<"WRONG_NUMBER_OF_SPAWNS">) {}

  /**
   * Create a spawner expecting `spawn()` to be called exactly `times` times.
   */
  static expect(times: number): MockSpawner {
    return new MockSpawner(
      new CallVerifier(times, {
        tag: "WRONG_NUMBER_OF_SPAWNS",
        describe: (expected, actual) =>
          `expected to spawn ${expected} task(s), actually spawned ${actual}`,
      })
    );
  }

  get expected(): number {
    return this.verifier.expected;
  }

  get timesCalled(): number {
    return this.verifier.actual;
  }

  /**
   * Never fails; the Result keeps call sites identical to the real spawner.
   */
  spawn<T>(token: SpawnToken<T>): Result<void, SpawnError> {
    token.forget();
    this.verifier.recordCall();
    return ok(undefined);
  }

  check(): Result<void, MockSpawnerError> {
    return this.verifier.check();
  }

  release(): void {
    this.verifier.release();
  }
}
