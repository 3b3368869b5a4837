import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    // Run test files in parallel
    pool: 'threads',
    poolOptions: {
      threads: {
        minThreads: 1,
        maxThreads: 4,
      },
    },
    // Integration tests spawn git and agent processes
    testTimeout: 30000,
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
  },
});
