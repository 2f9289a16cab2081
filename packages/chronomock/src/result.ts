/**
 * chronomock/result
 *
 * Result primitives used across the library: explicit checks, spawn
 * attempts and channel operations report expected failures as values
 * instead of throwing.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Unwrap Utilities
// =============================================================================

/**
 * Error thrown when attempting to unwrap an Err result.
 */
export class UnwrapError extends Error {
  public readonly error: unknown;
  public readonly cause?: unknown;

  constructor(result: Err<unknown, unknown>) {
    const errorStr =
      typeof result.error === "string"
        ? result.error
        : JSON.stringify(result.error);
    super(`Attempted to unwrap an Err: ${errorStr}`);
    this.name = "UnwrapError";
    this.error = result.error;
    this.cause = result.cause;
  }
}

/**
 * Extracts the value from an Ok result, or throws UnwrapError if it's an Err.
 *
 * @example
 * ```typescript
 * const spawner = MockSpawner.expect(1);
 * unwrap(spawner.spawn(blink()));
 * ```
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError(r);
};
