/**
 * Top pairs of players who homered on the same day.
 * Usage: npx tsx scripts/home-run-pairs.ts ["Player To Exclude"]
 */
import { sql } from '../src/db/pool.js';
import { findHomeRunPairs, type HomeRunPair } from '../src/db/queries.js';

const excluded = process.argv[2];

function print(title: string, pairs: HomeRunPair[]): void {
  console.log(`\n${title}`);
  if (pairs.length === 0) console.log('  (none)');
  for (const p of pairs) console.log(`  ${p.player1} / ${p.player2} - ${p.frequency} times`);
}

const { all, filtered } = await sql.begin(async (tx) => ({
  all: await findHomeRunPairs(tx),
  filtered: excluded ? await findHomeRunPairs(tx, { excludePlayerName: excluded }) : null,
}));

print('Top 10 player home run combinations (all players):', all);
if (excluded && filtered) print(`Top 10 player home run combinations (excluding ${excluded}):`, filtered);

await sql.end();
