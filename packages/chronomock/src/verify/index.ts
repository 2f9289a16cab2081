/**
 * Call accounting
 *
 * Shared by the spawn and tick mocks. A verifier holds an expected call
 * count fixed at construction and a counter bumped once per intercepted
 * call. It is finalized in one of two ways:
 *
 * - `check()` compares the counts and returns a Result. Nothing is thrown
 *   and the release-time check is switched off, whatever the outcome.
 * - `release()` runs when the holder goes out of scope (see
 *   `withVerification`). If `check()` never ran and the counts differ it
 *   throws a `VerificationError`.
 *
 * Until one of the two runs the verifier is pending, and `releasePending()`
 * releases it. `chronomock/vitest-setup` calls that after every test.
 *
 * @example
 * ```typescript
 * const verifier = new CallVerifier(2, {
 *   tag: 'WRONG_NUMBER_OF_PINGS',
 *   describe: (expected, actual) => `expected ${expected} ping(s), got ${actual}`,
 * });
 *
 * verifier.recordCall();
 * verifier.check(); // err({ type: 'WRONG_NUMBER_OF_PINGS', expected: 2, actual: 1 })
 * ```
 */

import { err, ok, type Result } from "../result";
import {
  CounterOverflowError,
  VerificationError,
  VerifierConsumedError,
  type CallCountMismatch,
} from "../errors";
import { registerPending, unregisterPending } from "./pending";

// =============================================================================
// Counter
// =============================================================================

/**
 * Monotonic call counter. Mock operations run synchronously on the
 * JavaScript thread, so a read-increment-write cannot interleave with
 * another one.
 */
export class CallCounter {
  private count: number;

  constructor(start = 0) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`Counter start must be a non-negative safe integer, got ${start}`);
    }
    this.count = start;
  }

  get value(): number {
    return this.count;
  }

  /**
   * @throws CounterOverflowError when the count would pass Number.MAX_SAFE_INTEGER
   */
  increment(): number {
    if (this.count >= Number.MAX_SAFE_INTEGER) {
      throw new CounterOverflowError(this.count);
    }
    this.count += 1;
    return this.count;
  }
}

// =============================================================================
// Verifier
// =============================================================================

export type VerifierState = "active" | "exempt" | "checked" | "released";

export interface CallVerifierOptions<Tag extends string> {
  /** Discriminant of the mismatch returned by `check()` */
  tag: Tag;
  /** Message of the VerificationError thrown on release */
  describe?: (expected: number, actual: number) => string;
}

/**
 * Anything that can be checked explicitly or released at scope exit.
 */
export interface Verifiable<E = unknown> {
  check(): Result<void, E>;
  release(): void;
}

const defaultDescribe = (expected: number, actual: number) =>
  `expected ${expected} call(s), actually called ${actual}`;

export class CallVerifier<Tag extends string = string>
  implements Verifiable<CallCountMismatch<Tag>>
{
  readonly expected: number;
  readonly tag: Tag;
  private readonly counter = new CallCounter();
  private readonly describe: (expected: number, actual: number) => string;
  private currentState: VerifierState;

  constructor(expected: number, options: CallVerifierOptions<Tag>) {
    if (!Number.isSafeInteger(expected) || expected < 0) {
      throw new RangeError(`Expected call count must be a non-negative integer, got ${expected}`);
    }
    this.expected = expected;
    this.tag = options.tag;
    this.describe = options.describe ?? defaultDescribe;
    this.currentState = "active";
    registerPending(this);
  }

  /**
   * A verifier with no expectation. Calls are not counted, `check()` always
   * passes and `release()` never throws.
   */
  static exempt<Tag extends string>(options: CallVerifierOptions<Tag>): CallVerifier<Tag> {
    const verifier = new CallVerifier(0, options);
    verifier.currentState = "exempt";
    unregisterPending(verifier);
    return verifier;
  }

  get actual(): number {
    return this.counter.value;
  }

  get state(): VerifierState {
    return this.currentState;
  }

  recordCall(): void {
    switch (this.currentState) {
      case "active":
        this.counter.increment();
        return;
      case "exempt":
        return;
      default:
        throw new VerifierConsumedError(this.tag, "recordCall");
    }
  }

  check(): Result<void, CallCountMismatch<Tag>> {
    if (this.currentState === "checked" || this.currentState === "released") {
      throw new VerifierConsumedError(this.tag, "check");
    }
    const wasExempt = this.currentState === "exempt";
    this.currentState = "checked";
    unregisterPending(this);
    if (wasExempt) return ok(undefined);

    const mismatch = this.mismatch();
    return mismatch ? err(mismatch) : ok(undefined);
  }

  /**
   * @throws VerificationError if the verifier is still active and the counts differ
   */
  release(): void {
    const wasActive = this.currentState === "active";
    unregisterPending(this);
    if (this.currentState !== "checked") {
      this.currentState = "released";
    }
    if (!wasActive) return;

    const mismatch = this.mismatch();
    if (mismatch) {
      throw new VerificationError(this.describe(mismatch.expected, mismatch.actual), mismatch);
    }
  }

  private mismatch(): CallCountMismatch<Tag> | undefined {
    const actual = this.counter.value;
    if (actual === this.expected) return undefined;
    return { type: this.tag, expected: this.expected, actual };
  }
}

export { releasePending, pendingCount, type ReleaseOptions } from "./pending";
export {
  createVerificationScope,
  withVerification,
  type VerificationScope,
  type VerificationScopeOptions,
} from "./scope";
