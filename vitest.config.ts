import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'annotext',
    environment: 'node',
    include: ['shared/common/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
