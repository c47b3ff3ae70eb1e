import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.pg.test.ts'],
    // Suites share one database and truncate it between tests.
    fileParallelism: false,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});
