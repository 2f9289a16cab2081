/**
 * chronomock/vitest-setup
 *
 * Fails a test that created a mock and neither checked nor released it
 * when its call count is wrong. Load it once from the Vitest config:
 *
 * @example
 * ```typescript
 * // vitest.config.ts
 * export default defineConfig({
 *   test: { setupFiles: ['chronomock/vitest-setup'] },
 * });
 * ```
 */

import { afterEach } from "vitest";
import { releasePending } from "./verify";

afterEach(() => {
  releasePending();
});
