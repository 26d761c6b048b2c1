import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['lib/src/**/*.ts'],
      exclude: ['lib/src/**/index.ts'],
    },
    testTimeout: 10000,
    fakeTimers: {
      shouldAdvanceTime: true,
    },
  },
  resolve: {
    alias: {
      '@local-rag/lib': fileURLToPath(new URL('./lib/src/index.ts', import.meta.url)),
    },
  },
});
