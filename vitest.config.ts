import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      '@chargetrace/core': fileURLToPath(new URL('./packages/core/src', import.meta.url)),
      '@chargetrace/shared': fileURLToPath(new URL('./packages/shared/src', import.meta.url)),
    },
  },
});
