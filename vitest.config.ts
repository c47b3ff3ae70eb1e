import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // Postgres-backed suites need a live database; run them with `npm run test:db`.
    exclude: ['**/node_modules/**', '**/dist/**', 'test/**/*.pg.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});
