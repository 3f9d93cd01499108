import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
  },
});
