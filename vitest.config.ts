import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    // Ledger and report tests work in their own temp directories.
    testTimeout: 10_000,
  },
});
