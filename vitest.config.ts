import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    // Grammar wasm loading is slow on cold caches
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
