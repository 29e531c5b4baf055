import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['skill/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      SOLTOOLS_LOG_LEVEL: 'silent',
    },
  },
});
