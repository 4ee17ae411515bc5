import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    // Run test files sequentially to avoid port and subprocess contention
    fileParallelism: false,
    testTimeout: 15000,
    hookTimeout: 30000
  }
});
