import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    restoreMocks: true,
  },
  resolve: {
    alias: {
      '@socialdraft/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
    },
  },
});
