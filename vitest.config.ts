/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: One run discovers tests in packages/ and apps/. Each workspace keeps
 *      its tests under tests/ beside src/.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    testTimeout: 20_000,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts', 'apps/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
