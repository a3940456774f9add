import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // End-to-end tests spawn node with the tsx loader
    testTimeout: 30_000
  }
});
