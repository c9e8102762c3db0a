import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    fileParallelism: false,
    env: {
      // Required fields with no schema defaults
      JWT_SECRET: 'test-jwt-secret-at-least-32-characters-long',
      ASGS_DB_USERNAME: 'settings_test',
      ASGS_DB_PASSWORD: 'test-password',
      LOG_LEVEL: 'silent',
    },
  },
});
