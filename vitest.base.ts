import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@notifier/shared': fileURLToPath(new URL('./Shared', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 10000,
    restoreMocks: true,
  },
});
