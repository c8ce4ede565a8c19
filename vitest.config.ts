import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['cortex/src/**/__tests__/**/*.test.ts'],
    setupFiles: ['cortex/src/memory/__tests__/setup.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
