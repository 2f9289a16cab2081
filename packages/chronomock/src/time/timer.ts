/**
 * Timer capability
 *
 * Timers are built through a `TimerFactory` and awaited. Production code
 * takes the factory as a parameter, so tests pass `MockTimer` where
 * production passes `SystemTimer`.
 *
 * @example
 * ```typescript
 * async function waitForTimer(Timer: TimerFactory) {
 *   await Timer.after(Duration.seconds(1));
 *   // Do something..
 * }
 *
 * await waitForTimer(SystemTimer); // production
 * await waitForTimer(MockTimer);   // test, resolves immediately
 * ```
 */

import type { Duration } from "../duration";
import { createChannel, type Receiver } from "./channel";
import { sleepUntil } from "./sleep";

export interface TimerFactory<T extends PromiseLike<void> = PromiseLike<void>> {
  after(duration: Duration): T;
}

// =============================================================================
// System timer
// =============================================================================

/**
 * Expires `duration` after it was created, not after it was first awaited.
 */
export class SystemTimer implements PromiseLike<void> {
  readonly expiresAt: number;
  private pending: Promise<void> | undefined;

  private constructor(readonly duration: Duration) {
    this.expiresAt = Date.now() + duration.millis;
  }

  static after(duration: Duration): SystemTimer {
    return new SystemTimer(duration);
  }

  then<R1 = void, R2 = never>(
    onfulfilled?: ((value: void) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    this.pending ??= sleepUntil(this.expiresAt);
    return this.pending.then(onfulfilled, onrejected);
  }
}

// =============================================================================
// Mock timer
// =============================================================================

export const DURATION_CHANNEL_CAPACITY = 5;

/**
 * Durations of resolved mock timers, in resolution order.
 *
 * Shared by every MockTimer in the process. Tests that read it must clear it
 * first and must not run alongside other tests that await mock timers.
 */
const DURATION_CHANNEL = createChannel<Duration>({ capacity: DURATION_CHANNEL_CAPACITY });

/**
 * A timer that resolves as soon as it is awaited.
 *
 * Each resolution also offers the timer's duration to a process-wide channel
 * so a test can see which durations were waited on, in which order.
 *
 * @example
 * ```typescript
 * const timer1 = MockTimer.after(Duration.millis(500));
 * const timer2 = MockTimer.after(Duration.seconds(1));
 *
 * // timer2 resolves first, so its duration is first in the channel.
 * await timer2;
 * await timer1;
 *
 * const rx = MockTimer.getReceiver();
 * rx.tryRecv(); // ok(Duration.seconds(1))
 * rx.tryRecv(); // ok(Duration.millis(500))
 * ```
 */
export class MockTimer implements PromiseLike<void> {
  private constructor(readonly duration: Duration) {}

  static after(duration: Duration): MockTimer {
    return new MockTimer(duration);
  }

  /**
   * Consumer side of the duration channel. The channel is shared by every
   * MockTimer, so tests running in parallel may see each other's values.
   */
  static getReceiver(): Receiver<Duration> {
    return DURATION_CHANNEL.receiver();
  }

  /** Drop every captured duration. */
  static clearChannel(): void {
    DURATION_CHANNEL.clear();
  }

  /**
   * Offers `duration` to the channel and resolves. Every call sends again,
   * so awaiting one timer twice captures its duration twice.
   */
  then<R1 = void, R2 = never>(
    onfulfilled?: ((value: void) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    // Capture is best effort: a full channel drops the value.
    DURATION_CHANNEL.trySend(this.duration);
    return Promise.resolve().then(onfulfilled, onrejected);
  }
}
