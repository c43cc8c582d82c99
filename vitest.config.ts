import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'apps/runner/src/**/__tests__/**/*.test.ts'],
    restoreMocks: true,
  },
});
