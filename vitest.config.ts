import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    testTimeout: 5000,
    include: ['src/**/*.test.ts'],
    // lowdb's JSONFilePreset swaps in an in-memory adapter when NODE_ENV is 'test'
    env: { NODE_ENV: 'development' }
  }
});
