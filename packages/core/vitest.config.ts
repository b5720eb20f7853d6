import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Scheduler tests wait on real chunk timeouts
    testTimeout: 10000,
  },
});
