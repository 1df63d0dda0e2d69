import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    env: {
      CHROMEPRESS_LOG_LEVEL: 'silent',
    },
  },
});
