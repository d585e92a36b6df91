import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/**/*.test.ts', 'tea-api/**/*.test.ts'],
    environment: 'node',
    globals: false
  }
});
