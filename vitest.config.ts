import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/backend/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
