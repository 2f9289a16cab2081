/**
 * chronomock
 *
 * Capability interfaces for a task spawner, a periodic ticker and a timer,
 * with production implementations on the Node.js event loop and
 * deterministic mocks for unit tests. Mocks never wait: tickers and timers
 * resolve immediately, spawned tasks are discarded, and every call is
 * counted so a test can check the usage.
 *
 * ## Entry Points
 *
 * - `chronomock/executor` - Spawner, task(), MockSpawner
 * - `chronomock/time` - Ticker, Timer, MockTicker, MockTimer, channels
 * - `chronomock/verify` - call accounting and verification scopes
 * - `chronomock/duration` - Duration values
 * - `chronomock/result` - Result types
 * - `chronomock/errors` - error types and guards
 * - `chronomock/vitest-setup` - releases unchecked mocks after every test
 */

export * from "./result";
export * from "./errors-entry";
export * from "./verify-entry";
export * from "./executor-entry";
export * from "./time-entry";
export {
  Duration,
  type Duration as DurationType,
  millis,
  seconds,
  minutes,
  hours,
} from "./duration";
