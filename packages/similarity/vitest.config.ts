/**
 * Workspace-level Vitest config for @textguard/similarity
 *
 * Lets `npm test -w @textguard/similarity` run from this directory; the root
 * config's include patterns are relative to the repository root.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
  },
});
