import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['printer/tests/**/*.test.ts'],
    environment: 'node',
  },
});
