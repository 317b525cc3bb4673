import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      TYPED_DATA_LOG_LEVEL: 'error',
    },
  },
});
