import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['dist', 'node_modules'],
    environment: 'node',
    globals: true, // allows `describe/it/expect` without imports
    reporters: ['default'],
  },
});
