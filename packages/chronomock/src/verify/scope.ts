/**
 * Verification scopes
 *
 * JavaScript has no destructor, so the release-time check runs when a
 * scope ends. `withVerification` releases every tracked mock on every exit
 * path of its body: normal return, early return or a thrown error.
 *
 * @example
 * ```typescript
 * await withVerification(async (scope) => {
 *   const spawner = scope.track(MockSpawner.expect(2));
 *   spawnTasks(spawner);
 * }); // throws VerificationError if spawnTasks spawned anything but 2 tasks
 * ```
 *
 * Under Vitest a scope can also be released from a hook:
 *
 * ```typescript
 * const scope = createVerificationScope();
 * afterEach(() => scope.release());
 * ```
 */

import type { Verifiable } from "./index";
import { releaseEach, throwFailures, type ReleaseOptions } from "./pending";

export type VerificationScopeOptions = ReleaseOptions;

export interface VerificationScope {
  /** Register a holder and return it unchanged. */
  track<T extends Pick<Verifiable, "release">>(holder: T): T;
  /**
   * Release every tracked holder, newest first, then forget them.
   * Throws the single failure, or an AggregateError when several failed.
   */
  release(): void;
  /** Number of holders waiting for release */
  readonly size: number;
}

interface InternalScope extends VerificationScope {
  releaseAll(): unknown[];
}

function buildScope(options: VerificationScopeOptions = {}): InternalScope {
  const { logger = () => {} } = options;
  let holders: Array<Pick<Verifiable, "release">> = [];

  const releaseAll = (): unknown[] => {
    const tracked = holders;
    holders = [];
    return releaseEach(tracked, logger);
  };

  return {
    track<T extends Pick<Verifiable, "release">>(holder: T): T {
      holders.push(holder);
      return holder;
    },
    release() {
      throwFailures(releaseAll());
    },
    releaseAll,
    get size() {
      return holders.length;
    },
  };
}

export function createVerificationScope(options?: VerificationScopeOptions): VerificationScope {
  return buildScope(options);
}

/**
 * Run `body` with a fresh scope and release it afterwards.
 *
 * If only the body fails, its error propagates unchanged. If release also
 * fails, an AggregateError is thrown holding the body error first, then
 * every release failure.
 */
export async function withVerification<T>(
  body: (scope: VerificationScope) => T | Promise<T>,
  options?: VerificationScopeOptions
): Promise<T> {
  const scope = buildScope(options);
  let value: T;
  try {
    value = await body(scope);
  } catch (bodyError) {
    const failures = scope.releaseAll();
    if (failures.length === 0) throw bodyError;
    throw new AggregateError(
      [bodyError, ...failures],
      `Scope body failed and ${failures.length} mock(s) failed verification`
    );
  }
  scope.release();
  return value;
}
