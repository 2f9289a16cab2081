/**
 * Longest delay `setTimeout` honours. Node fires longer delays after 1ms.
 */
export const MAX_TIMEOUT_MS = 0x7fffffff;

/**
 * Resolves once `Date.now()` reaches `deadline`, waiting in chunks no longer
 * than MAX_TIMEOUT_MS. A deadline already passed resolves without a timer.
 */
export async function sleepUntil(deadline: number): Promise<void> {
  let wait = deadline - Date.now();
  while (wait > 0) {
    const chunk = Math.min(Math.ceil(wait), MAX_TIMEOUT_MS);
    await new Promise((resolve) => setTimeout(resolve, chunk));
    wait = deadline - Date.now();
  }
}
