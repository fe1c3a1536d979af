import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/**/src/__tests__/**/*.test.ts'],
  },
});
