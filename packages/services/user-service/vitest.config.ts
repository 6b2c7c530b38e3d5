import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'user-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
