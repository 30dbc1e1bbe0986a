/**
 * Vitest Configuration for manifest-reconciler
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 30000,

    // Enable globals for describe, it, expect
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    // Environment
    environment: 'node',

    // Type checking
    typecheck: {
      enabled: false, // Disable for faster tests; use tsc --noEmit separately
    },
  },
});
