import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cipher',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
