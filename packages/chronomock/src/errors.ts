/**
 * chronomock/errors
 *
 * Expected failures travel inside a Result as plain objects with a `type`
 * discriminant. Fatal ones (a mock released with the wrong call count, a
 * counter overflow, a consumed verifier or token) are thrown.
 */

// =============================================================================
// Result error objects
// =============================================================================

/**
 * Structured outcome of an explicit `check()` that found the wrong number of
 * calls. Comparable with deep equality, so table-driven tests can assert on it.
 */
export interface CallCountMismatch<Tag extends string = string> {
  type: Tag;
  expected: number;
  actual: number;
}

/**
 * The task's pool had no free slot when its spawn token was created.
 */
export interface SpawnBusyError {
  type: "SPAWN_BUSY";
  taskName: string;
}

export type SpawnError = SpawnBusyError;

export function isCallCountMismatch(error: unknown): error is CallCountMismatch {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    typeof error.type === "string" &&
    "expected" in error &&
    typeof error.expected === "number" &&
    "actual" in error &&
    typeof error.actual === "number"
  );
}

export function isSpawnError(error: unknown): error is SpawnError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "SPAWN_BUSY" &&
    "taskName" in error &&
    typeof error.taskName === "string"
  );
}

// =============================================================================
// Thrown errors
// =============================================================================

/**
 * Thrown when a mock is released without an explicit check and its call
 * count does not match the expectation.
 */
export class VerificationError<Tag extends string = string> extends Error {
  public readonly expected: number;
  public readonly actual: number;

  constructor(
    message: string,
    public readonly mismatch: CallCountMismatch<Tag>
  ) {
    super(message);
    this.name = "VerificationError";
    this.expected = mismatch.expected;
    this.actual = mismatch.actual;
  }
}

export function isVerificationError(error: unknown): error is VerificationError {
  return error instanceof VerificationError;
}

/**
 * Thrown when a call counter would pass `Number.MAX_SAFE_INTEGER`.
 */
export class CounterOverflowError extends Error {
  constructor(public readonly count: number) {
    super(`Call counter overflowed at ${count}`);
    this.name = "CounterOverflowError";
  }
}

/**
 * Thrown when a verifier is used after its explicit check or release.
 */
export class VerifierConsumedError extends Error {
  constructor(
    public readonly tag: string,
    public readonly operation: "recordCall" | "check"
  ) {
    super(`Verifier ${tag} was already finalized; ${operation}() is not allowed`);
    this.name = "VerifierConsumedError";
  }
}

/**
 * Thrown when a spawn token is handed to a spawner after it was already
 * spawned or forgotten.
 */
export class SpawnTokenConsumedError extends Error {
  constructor(
    public readonly taskName: string,
    public readonly state: "spawned" | "forgotten"
  ) {
    super(`Spawn token for task ${taskName} was already ${state}`);
    this.name = "SpawnTokenConsumedError";
  }
}
