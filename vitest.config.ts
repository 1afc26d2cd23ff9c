import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/__tests__/**/*.spec.ts'],
    testTimeout: 20_000,
    env: {
      LOG_LEVEL: 'error'
    }
  }
});
