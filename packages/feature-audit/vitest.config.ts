import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'feature-audit',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
