import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * One run covers the unit tests of every workspace package
 * (`<package>/src/__tests__/*.test.ts`). Workspace packages resolve to
 * their TypeScript sources through their package.json exports.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['*/src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
      ],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
