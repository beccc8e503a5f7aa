import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    setupFiles: ['packages/shared/src/__tests__/setup.ts'],
    environment: 'node',
  },
});
