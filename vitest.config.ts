import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/test/**/*.spec.ts'],
    env: {
      STORAGE_BACKEND: 'sqlite',
      DB_PATH: ':memory:',
    },
  },
});
