/**
 * chronomock/duration
 *
 * Type-safe time durations passed to tickers and timers. A Duration is a
 * plain frozen value, so two durations built from the same amount compare
 * equal with `equals` and with deep equality in tests.
 *
 * Durations have microsecond resolution: amounts are rounded to the nearest
 * microsecond on construction, so `parse(format(d))` gives back `d`.
 */

/** Duration object with tagged type for type safety */
export type Duration = { readonly _tag: "Duration"; readonly millis: number };

const MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const make = (ms: number): Duration => {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Duration must be a finite, non-negative amount, got ${ms}`);
  }
  const duration: Duration = { _tag: "Duration", millis: Math.round(ms * 1000) / 1000 };
  return Object.freeze(duration);
};

// =============================================================================
// Constructors
// =============================================================================

export const fromMicros = (us: number): Duration => make(us / 1000);
export const millis = (ms: number): Duration => make(ms);
export const seconds = (s: number): Duration => make(s * 1000);
export const minutes = (m: number): Duration => make(m * 60_000);
export const hours = (h: number): Duration => make(h * 3_600_000);

/** The empty duration. */
export const zero: Duration = make(0);

// =============================================================================
// Conversions
// =============================================================================

export const toMillis = (d: Duration): number => d.millis;
export const toSeconds = (d: Duration): number => d.millis / 1000;
export const toMicros = (d: Duration): number => Math.round(d.millis * 1000);

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration" &&
    "millis" in value &&
    typeof value.millis === "number"
  );
}

// =============================================================================
// Arithmetic & Comparison
// =============================================================================

export const add = (a: Duration, b: Duration): Duration => make(a.millis + b.millis);

/** Saturates at zero. */
export const subtract = (a: Duration, b: Duration): Duration =>
  make(Math.max(0, a.millis - b.millis));

export const equals = (a: Duration, b: Duration): boolean => a.millis === b.millis;
export const lessThan = (a: Duration, b: Duration): boolean => a.millis < b.millis;
export const greaterThan = (a: Duration, b: Duration): boolean => a.millis > b.millis;

// =============================================================================
// Parsing & Formatting
// =============================================================================

/**
 * Parse a duration string like "250us", "100ms", "5s", "2m", "1h", "1d".
 * Returns undefined for anything else.
 */
export function parse(input: string): Duration | undefined {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(us|ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  if (unit === "us") return fromMicros(value);
  return make(value * (MULTIPLIERS[unit] ?? 1));
}

/**
 * Human-readable form using the largest unit that divides the duration
 * exactly, e.g. `format(seconds(90))` is "90s" and `format(millis(1500))`
 * is "1500ms".
 */
export function format(d: Duration): string {
  const ms = d.millis;
  if (ms === 0) return "0ms";
  if (!Number.isInteger(ms)) return `${toMicros(d)}us`;
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0) return `${ms / 60_000}m`;
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}

/**
 * Namespace form, for call sites that read better as `Duration.seconds(1)`.
 */
export const Duration = {
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
} as const;
