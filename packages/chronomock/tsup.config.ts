import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (everything)
    index: 'src/index.ts',

    // =========================================================================
    // Capabilities
    // =========================================================================
    executor: 'src/executor-entry.ts',
    time: 'src/time-entry.ts',

    // =========================================================================
    // Utility entry points (optional granular imports)
    // =========================================================================
    verify: 'src/verify-entry.ts',
    duration: 'src/duration-entry.ts',
    result: 'src/result.ts',
    errors: 'src/errors-entry.ts',

    // =========================================================================
    // Test runner integration
    // =========================================================================
    'vitest-setup': 'src/vitest-setup.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
});
