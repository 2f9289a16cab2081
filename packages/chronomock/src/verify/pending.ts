/**
 * Unfinalized verifiers
 *
 * Every active verifier is registered here until it is checked or
 * released, so a test runner can release the ones a test forgot about.
 * `chronomock/vitest-setup` does this after every test.
 */

import type { Verifiable } from "./index";

type Releasable = Pick<Verifiable, "release">;

export interface ReleaseOptions {
  /** Called once per holder whose release failed */
  logger?: (message: string) => void;
}

const pending = new Set<Releasable>();

export function registerPending(holder: Releasable): void {
  pending.add(holder);
}

export function unregisterPending(holder: Releasable): void {
  pending.delete(holder);
}

/** Number of verifiers neither checked nor released */
export function pendingCount(): number {
  return pending.size;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Release `holders` newest first and return every failure.
 */
export function releaseEach(
  holders: readonly Releasable[],
  logger: (message: string) => void
): unknown[] {
  const failures: unknown[] = [];
  for (let i = holders.length - 1; i >= 0; i--) {
    try {
      holders[i].release();
    } catch (error) {
      logger(`Verification failed on release: ${messageOf(error)}`);
      failures.push(error);
    }
  }
  return failures;
}

export function throwFailures(failures: unknown[]): void {
  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new AggregateError(failures, `${failures.length} mocks failed verification`);
  }
}

/**
 * Release every verifier that was neither checked nor released.
 *
 * @throws the single VerificationError, or an AggregateError when several failed
 *
 * @example
 * ```typescript
 * afterEach(() => releasePending());
 * ```
 */
export function releasePending(options: ReleaseOptions = {}): void {
  const { logger = () => {} } = options;
  const holders = [...pending];
  pending.clear();
  throwFailures(releaseEach(holders, logger));
}
