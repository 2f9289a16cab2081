/**
 * chronomock/duration
 *
 * Type-safe time durations: avoid "is this milliseconds or seconds?" confusion.
 */

export {
  type Duration as DurationType,
  Duration,
  fromMicros,
  millis,
  seconds,
  minutes,
  hours,
  zero,
  toMillis,
  toSeconds,
  toMicros,
  isDuration,
  add,
  subtract,
  equals,
  lessThan,
  greaterThan,
  parse,
  format,
} from "./duration";
