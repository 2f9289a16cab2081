/**
 * Spawner capability and the event-loop implementation used in production.
 */

import { setImmediate } from "node:timers/promises";
import { err, ok, type Result } from "../result";
import type { SpawnError } from "../errors";
import type { SpawnToken } from "./task";

/**
 * What production code needs from an executor. Write code against this
 * interface and pass `createEventLoopSpawner()` in production and
 * `MockSpawner.expect(n)` in tests.
 */
export interface Spawner {
  spawn<T>(token: SpawnToken<T>): Result<void, SpawnError>;
}

export interface EventLoopSpawnerOptions {
  /** Receives task lifecycle messages */
  logger?: (message: string) => void;
  /** Called when a spawned task rejects */
  onTaskError?: (error: unknown, taskName: string) => void;
}

export interface EventLoopSpawner extends Spawner {
  /** Tasks spawned and not yet settled */
  readonly active: number;
  /**
   * Resolves once every spawned task has settled. Rejects with the error of
   * an `onTaskError` or `logger` call that threw meanwhile, or an
   * AggregateError when several did.
   */
  idle(): Promise<void>;
}

export function createEventLoopSpawner(options: EventLoopSpawnerOptions = {}): EventLoopSpawner {
  const { logger = () => {}, onTaskError } = options;
  const inflight = new Set<Promise<void>>();
  const hookFailures: unknown[] = [];

  const execute = async (name: string, run: () => Promise<unknown>): Promise<void> => {
    // Start on a later turn so spawn() returns before the task body runs.
    await setImmediate();
    let failure: { error: unknown } | undefined;
    try {
      await run();
    } catch (error) {
      failure = { error };
    }
    // A throwing hook rejects here and is collected for idle().
    if (!failure) {
      logger(`Task ${name} completed`);
      return;
    }
    const { error } = failure;
    logger(`Task ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
    onTaskError?.(error, name);
  };

  return {
    spawn<T>(token: SpawnToken<T>): Result<void, SpawnError> {
      const run = token.take();
      if (!run) {
        logger(`Task ${token.name} is busy, pool exhausted`);
        return err({ type: "SPAWN_BUSY", taskName: token.name });
      }
      const settled: Promise<void> = execute(token.name, run)
        .catch((hookError: unknown) => {
          hookFailures.push(hookError);
        })
        .finally(() => {
          inflight.delete(settled);
        });
      inflight.add(settled);
      logger(`Task ${token.name} spawned`);
      return ok(undefined);
    },
    get active() {
      return inflight.size;
    },
    async idle() {
      while (inflight.size > 0) {
        await Promise.all(inflight);
      }
      const failures = hookFailures.splice(0, hookFailures.length);
      if (failures.length === 1) throw failures[0];
      if (failures.length > 1) {
        throw new AggregateError(failures, `${failures.length} task handlers failed`);
      }
    },
  };
}
