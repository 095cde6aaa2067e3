import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_DIR: 'logs/test',
      LOG_ECHO: 'false',
    },
  },
});
