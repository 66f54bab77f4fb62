import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['utils/**/__tests__/**/*.test.ts', 'services/**/__tests__/**/*.test.ts'],
  },
});
