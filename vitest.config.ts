// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    // Monte-Carlo cross-checks run a few hundred simulated experiments
    testTimeout: 20000,
  },
});
