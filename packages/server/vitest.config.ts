import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // HTTP tests bind real sockets on 127.0.0.1
    testTimeout: 15000,
    coverage: {
      include: ['src/**/*.ts'],
      exclude: ['src/main.ts', 'src/**/*.test.ts', 'src/test-helpers.ts'],
    },
  },
});
