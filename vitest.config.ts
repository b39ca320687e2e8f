import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/src/**/__tests__/**/*.test.ts'],
    pool: 'forks',
    env: {
      LOG_DIR: '',
      DEBUG: 'false',
      OPENAI_API_KEY: '',
    },
  },
});
