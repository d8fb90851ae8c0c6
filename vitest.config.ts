import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts', 'types/src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['backend/src/test/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'ERROR',
    },
  },
});
