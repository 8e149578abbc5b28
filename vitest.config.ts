import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  // Resolve workspace packages to their TypeScript sources instead of dist/
  resolve: {
    alias: {
      '@envcompare/core': fileURLToPath(new URL('./packages/core/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
