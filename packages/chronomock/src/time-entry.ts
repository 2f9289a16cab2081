/**
 * chronomock/time
 *
 * The Ticker and Timer capabilities with their system and mock
 * implementations, plus the bounded channel that captures mock timer
 * durations.
 *
 * @example
 * ```typescript
 * import { MockTimer, type TimerFactory } from 'chronomock/time';
 * import { Duration } from 'chronomock/duration';
 *
 * async function useATimer(Timer: TimerFactory) {
 *   await Timer.after(Duration.seconds(1));
 *   await Timer.after(Duration.millis(500));
 * }
 *
 * MockTimer.clearChannel();
 * await useATimer(MockTimer);
 *
 * const rx = MockTimer.getReceiver();
 * rx.tryRecv(); // ok(Duration.seconds(1))
 * rx.tryRecv(); // ok(Duration.millis(500))
 * ```
 */

export {
  // Ticker
  type Ticker,
  type TickerFactory,
  SystemTicker,
  MockTicker,
  type MockTickerError,

  // Timer
  type TimerFactory,
  SystemTimer,
  MockTimer,
  DURATION_CHANNEL_CAPACITY,

  // Channel
  createChannel,
  type BoundedChannel,
  type ChannelOptions,
  type Sender,
  type Receiver,
  type TrySendError,
  type TryRecvError,
} from "./time";
