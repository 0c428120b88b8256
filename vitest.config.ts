import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Test configuration for every package in the workspace.
 */

// Windows uses threads, Unix-like systems use forks for isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool,
    poolOptions: {
      threads: { singleThread: false, isolate: true },
      forks: { isolate: true },
    },

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries: surface nondeterminism immediately
    retry: 0,
    fileParallelism: !isCI,

    // Property-based suites run longer than unit tests
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/core/src/types/ast.ts',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
