import { sql } from './db/pool.js';
import { PostgresIngestStore } from './db/postgres-store.js';
import { runMigrations } from '../migrations/runner.js';
import { runBatch } from './pipeline/orchestrator.js';
import { config } from './config.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('Starting mlb-ingest...');

  await runMigrations(sql);

  const store = new PostgresIngestStore(sql);
  try {
    const summary = await runBatch({
      store,
      intakeDir: config.INTAKE_DIR,
      archiveDir: config.ARCHIVE_DIR,
    });
    if (summary.failed.length > 0) {
      logger.warn({ failed: summary.failed }, 'Some units failed and were left in the intake directory');
    }
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  logger.fatal(err, 'Ingest run failed to start');
  process.exit(1);
});
