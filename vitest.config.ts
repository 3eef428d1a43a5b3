// ============================================================================
// FOILGEN — Vitest configuration
//
// Unit tests live in tests/unit, fast smoke tests in tests/smoke.
// Pure TypeScript, node environment, no DOM.
// ============================================================================

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    globals: true,
  },
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
