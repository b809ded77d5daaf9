import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['domain/**/*.ts', 'application/**/*.ts', 'infrastructure/**/*.ts', 'services/**/*.ts'],
      exclude: ['**/__tests__/**', '**/index.ts'],
    },
  },
});
