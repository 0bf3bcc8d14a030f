import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for every workspace package.
 *
 * Workspace packages resolve to their TypeScript sources, so tests never
 * need a build first.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@activetable/core': fileURLToPath(new URL('./core/src/index.ts', import.meta.url)),
      '@activetable/config': fileURLToPath(new URL('./config/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'core/src/__tests__/**/*.unit.test.ts',
      'config/src/__tests__/**/*.unit.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
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
