import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    env: {
      DISPATCH_LOG_LEVEL: 'silent',
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli.ts'],
    },
  },
});
