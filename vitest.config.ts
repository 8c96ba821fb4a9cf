import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    globals: false,
    testTimeout: 10_000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
