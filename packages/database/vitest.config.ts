import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'database',
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    testTimeout: 30000,
  },
});
