import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',

    // Test timeout settings
    testTimeout: 10000,
    hookTimeout: 15000,

    // Test file patterns
    include: ['packages/**/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Test setup
    setupFiles: ['./test-setup.ts'],
  },

  // Resolve configuration for monorepo
  resolve: {
    alias: {
      '@askbridge/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
    },
  },
});
