import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    conditions: ['development'],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['./packages/chronomock/src/vitest-setup.ts'],
  },
});
