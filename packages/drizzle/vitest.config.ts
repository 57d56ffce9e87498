import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'drizzle',
    globals: true,
    environment: 'node',
    include: ['test/**/*.{test,spec}.ts'],
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/*.spec.ts', '**/*.test.ts', '**/dist/**', '**/node_modules/**'],
    },
  },
});
