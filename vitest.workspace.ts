/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into two categories:
 * - unit: Fast, isolated tests (*.unit.test.ts)
 * - integration: Tests that exercise several packages together (*.integration.test.ts)
 *
 * Usage:
 *   npm test                          # Run everything once
 *   npm run test:unit                 # Run only unit tests
 *   npm run test:integration          # Run only integration tests
 */

const PACKAGES = ['core', 'memory', 'config'];

export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.unit.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: PACKAGES.map(pkg => `${pkg}/src/__tests__/**/*.integration.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
      // Integration tests may need more time
      testTimeout: 15000,
    },
  },
];
