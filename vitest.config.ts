import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts', 'clients/javascript/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      OPENAI_API_KEY: 'test-secret',
    },
  },
});
