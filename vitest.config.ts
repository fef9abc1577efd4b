import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['benchdiff-engine/tests/**/*.test.ts', 'benchdiff-cli/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
