import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['node/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'fatal',
      NODE_ENV: 'test',
    },
  },
});
