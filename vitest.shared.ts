import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

/**
 * Shared Vitest Configuration
 *
 * This configuration is extended by all projects in vitest.workspace.ts.
 * It contains common settings for test execution and coverage.
 */
export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources, no build needed
      '@tuplet/core': fromRoot('./core/src/index.ts'),
      '@tuplet/memory': fromRoot('./memory/src/index.ts'),
      '@tuplet/config': fromRoot('./config/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
