import { sql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

const applied = await runMigrations(sql);
console.log(applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Schema already up to date.');
await sql.end();
