import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/typescript/*/tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@ensemble/client': fileURLToPath(new URL('./packages/typescript/client/src/index.ts', import.meta.url)),
      '@ensemble/test-utils': fileURLToPath(new URL('./packages/typescript/test-utils/src/index.ts', import.meta.url)),
    },
  },
});
