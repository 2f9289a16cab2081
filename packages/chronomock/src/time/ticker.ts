/**
 * Ticker capability
 *
 * Production code waits for ticks through the `Ticker` interface and builds
 * tickers through a `TickerFactory`, so a test can hand it `MockTicker`
 * where production passes `SystemTicker`.
 *
 * @example
 * ```typescript
 * async function waitForTicker(ticker: Ticker) {
 *   await ticker.next();
 * }
 *
 * // production
 * await waitForTicker(SystemTicker.every(Duration.seconds(1)));
 *
 * // test
 * const ticker = MockTicker.expect(1);
 * await waitForTicker(ticker);
 * expect(ticker.check()).toEqual(ok(undefined));
 * ```
 */

import type { Result } from "../result";
import type { Duration } from "../duration";
import type { CallCountMismatch } from "../errors";
import { CallVerifier, type Verifiable } from "../verify";
import { sleepUntil } from "./sleep";

export interface Ticker {
  /** Resolves on the next tick. */
  next(): Promise<void>;
}

export interface TickerFactory<T extends Ticker = Ticker> {
  every(duration: Duration): T;
}

// =============================================================================
// System ticker
// =============================================================================

/**
 * Ticks at fixed multiples of the period, counted from creation or the
 * last `reset()`. A tick that is already due when `next()` is called
 * resolves without waiting, so a slow consumer catches up instead of
 * drifting.
 */
export class SystemTicker implements Ticker {
  private expiresAt: number;

  private constructor(readonly period: Duration) {
    this.expiresAt = Date.now() + period.millis;
  }

  static every(duration: Duration): SystemTicker {
    return new SystemTicker(duration);
  }

  /** Restart the schedule from now. */
  reset(): void {
    this.expiresAt = Date.now() + this.period.millis;
  }

  next(): Promise<void> {
    const due = this.expiresAt;
    this.expiresAt += this.period.millis;
    return sleepUntil(due);
  }
}

// =============================================================================
// Mock ticker
// =============================================================================

export type MockTickerError = CallCountMismatch<"WRONG_NUMBER_OF_TICKS">;

const TICKS = {
  tag: "WRONG_NUMBER_OF_TICKS",
  describe: (expected: number, actual: number) =>
    `expected to call next ${expected} time(s), actually called ${actual}`,
} as const;

/**
 * A ticker whose `next()` is always ready. Each call is counted; the count
 * is verified by `check()` or, failing that, by `release()`.
 *
 * @example
 * ```typescript
 * const ticker = MockTicker.expect(3);
 * await ticker.next();
 *
 * ticker.check();
 * // err({ type: 'WRONG_NUMBER_OF_TICKS', expected: 3, actual: 1 })
 * ```
 */
export class MockTicker implements Ticker, Verifiable<MockTickerError> {
  private constructor(private readonly verifier: CallVerifier<"WRONG_NUMBER_OF_TICKS">) {}

  /**
   * Create a ticker expecting `next()` to be called exactly `times` times.
   */
  static expect(times: number): MockTicker {
    return new MockTicker(new CallVerifier(times, TICKS));
  }

  /**
   * Stand-in for `SystemTicker.every` in code that builds its own ticker and
   * so cannot state an expectation. The period is ignored and the ticker is
   * never verified.
   */
  static every(_duration: Duration): MockTicker {
    return new MockTicker(CallVerifier.exempt(TICKS));
  }

  get timesCalled(): number {
    return this.verifier.actual;
  }

  /**
   * Counts the call before returning. Rejects with VerifierConsumedError
   * once the ticker was checked or released.
   */
  async next(): Promise<void> {
    this.verifier.recordCall();
  }

  check(): Result<void, MockTickerError> {
    return this.verifier.check();
  }

  release(): void {
    this.verifier.release();
  }
}
