import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(process.cwd(), 'node/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['node/tests/**/*.test.ts'],
    setupFiles: ['node/tests/setup.ts'],
    testTimeout: 30000,
  },
});
