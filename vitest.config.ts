import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/tests/**/*.test.ts', 'server/tests/**/*.spec.ts'],
    testTimeout: 10000,
    coverage: {
      reporter: ['text', 'lcov'],
    },
  },
});
