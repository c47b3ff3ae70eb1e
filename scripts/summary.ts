/**
 * Print a summary of the database state.
 */
import fs from 'node:fs';
import { sql } from '../src/db/pool.js';
import { PostgresIngestStore } from '../src/db/postgres-store.js';
import { discoverUnits } from '../src/pipeline/orchestrator.js';
import { config } from '../src/config.js';

const store = new PostgresIngestStore(sql);

const counts = await store.countRows();
console.log('=== Row Counts ===');
console.log(`  teams:            ${counts.teams}`);
console.log(`  players:          ${counts.players}`);
console.log(`  games:            ${counts.games}`);
console.log(`  batter_stats:     ${counts.batterStats}`);
console.log(`  pitcher_stats:    ${counts.pitcherStats}`);
console.log(`  processed_ranges: ${counts.processedRanges}`);

const ranges = await store.listProcessedRanges();
console.log(`\n=== Processed Ranges (${ranges.length}) ===`);
for (const r of ranges) {
  console.log(`  ${r.start} .. ${r.end}  ${r.sourceToken}  (${r.processedAt.toISOString()})`);
}

const pending = discoverUnits(config.INTAKE_DIR);
const archived = fs.existsSync(config.ARCHIVE_DIR)
  ? fs.readdirSync(config.ARCHIVE_DIR).filter((f) => f.endsWith('.json')).length
  : 0;
console.log(`\n=== Snapshots: ${pending.length} pending in ${config.INTAKE_DIR}, ${archived} archived ===`);
for (const token of pending) console.log(`  pending: ${token}`);

await store.close();
