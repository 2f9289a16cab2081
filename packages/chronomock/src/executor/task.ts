/**
 * Tasks and spawn tokens
 *
 * `task(fn)` turns an async function into a task function. Calling the task
 * function does not run anything: it claims a slot of the task's pool and
 * returns a SpawnToken holding the deferred work. A spawner either runs the
 * token (`take()`) or, in the mock, discards it (`forget()`).
 */

import { SpawnTokenConsumedError } from "../errors";

export type SpawnTokenState = "pending" | "spawned" | "forgotten";

interface PoolSlot {
  free(): void;
}

class TaskPool {
  private inUse = 0;

  constructor(readonly size: number) {}

  get running(): number {
    return this.inUse;
  }

  claim(): PoolSlot | undefined {
    if (this.inUse >= this.size) return undefined;
    this.inUse++;
    let freed = false;
    return {
      free: () => {
        if (freed) return;
        freed = true;
        this.inUse--;
      },
    };
  }
}

export class SpawnToken<T = unknown> {
  private currentState: SpawnTokenState = "pending";

  constructor(
    readonly name: string,
    private work: (() => Promise<T>) | undefined,
    private readonly slot: PoolSlot | undefined
  ) {}

  get state(): SpawnTokenState {
    return this.currentState;
  }

  /** True when the pool was exhausted; spawning it fails with SPAWN_BUSY. */
  get isEmpty(): boolean {
    return this.slot === undefined;
  }

  /**
   * Discard the token without running its work and give back its pool slot.
   *
   * @throws SpawnTokenConsumedError if the token was already spawned or forgotten
   */
  forget(): void {
    if (this.currentState !== "pending") {
      throw new SpawnTokenConsumedError(this.name, this.currentState);
    }
    this.currentState = "forgotten";
    this.work = undefined;
    this.slot?.free();
  }

  /**
   * Hand the work over to a spawner. Returns undefined for an empty token,
   * which is discarded. The returned function frees the pool slot once the
   * work settles.
   *
   * @throws SpawnTokenConsumedError if the token was already spawned or forgotten
   */
  take(): (() => Promise<T>) | undefined {
    if (this.currentState !== "pending") {
      throw new SpawnTokenConsumedError(this.name, this.currentState);
    }
    const { work, slot } = this;
    this.work = undefined;
    if (!work || !slot) {
      this.currentState = "forgotten";
      return undefined;
    }
    this.currentState = "spawned";
    return async () => {
      try {
        return await work();
      } finally {
        slot.free();
      }
    };
  }
}

export interface TaskOptions {
  /** Name used in errors and logs. Defaults to the function's name. */
  name?: string;
  /**
   * How many instances of the task may exist at once.
   * @default 1
   */
  poolSize?: number;
}

export type TaskFunction<Args extends unknown[], T> = ((...args: Args) => SpawnToken<T>) & {
  readonly taskName: string;
  readonly poolSize: number;
  /** Instances currently holding a pool slot */
  running(): number;
};

/**
 * @example
 * ```typescript
 * const blink = task(async (led: Led, period: Duration) => {
 *   for (;;) {
 *     led.toggle();
 *     await Timer.after(period);
 *   }
 * }, { name: 'blink' });
 *
 * spawner.spawn(blink(led, Duration.millis(500)));
 * ```
 */
export function task<Args extends unknown[], T>(
  fn: (...args: Args) => Promise<T>,
  options: TaskOptions = {}
): TaskFunction<Args, T> {
  const { name = fn.name || "anonymous", poolSize = 1 } = options;
  if (!Number.isSafeInteger(poolSize) || poolSize < 1) {
    throw new RangeError(`Task ${name}: poolSize must be a positive integer, got ${poolSize}`);
  }
  const pool = new TaskPool(poolSize);

  const create = (...args: Args): SpawnToken<T> => {
    const slot = pool.claim();
    return new SpawnToken(name, slot ? () => fn(...args) : undefined, slot);
  };

  return Object.assign(create, {
    taskName: name,
    poolSize,
    running: () => pool.running,
  });
}
