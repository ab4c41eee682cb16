import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Needs DATABASE_URL pointing at a disposable MongoDB
    include: ['src/**/__tests__/*.int.test.ts'],
    pool: 'forks',
    fileParallelism: false,
    testTimeout: 15000,
  },
});
