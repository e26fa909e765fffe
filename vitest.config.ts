import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    // MathJax and sharp load on first local render
    testTimeout: 30_000,
  },
});
