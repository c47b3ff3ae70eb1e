import type { IngestTx } from '../db/store.js';
import type { BatterStatRow, PitcherStatRow, StatKind } from '../types/entities.js';
import type { Logger } from '../utils/logger.js';

type StatWriter = Pick<IngestTx, 'insertBatterStats' | 'insertPitcherStats'>;

export type StatBatch =
  | { kind: 'batter'; rows: BatterStatRow[] }
  | { kind: 'pitcher'; rows: PitcherStatRow[] };

const TABLES: Record<StatKind, string> = {
  batter: 'batter_stats',
  pitcher: 'pitcher_stats',
};

/**
 * Bulk-insert one kind of stat line. Large batches go out in several statements
 * inside the caller's transaction, so a failure still leaves none of them.
 * Rows must already carry resolved internal ids; foreign keys are not re-checked here.
 * Returns the number of rows written, for logging only.
 */
export async function loadStatLines(db: StatWriter, batch: StatBatch, log?: Logger): Promise<number> {
  if (batch.rows.length === 0) return 0;

  const inserted =
    batch.kind === 'batter'
      ? await db.insertBatterStats(batch.rows)
      : await db.insertPitcherStats(batch.rows);

  log?.info({ table: TABLES[batch.kind], rows: batch.rows.length, inserted }, 'Bulk inserted stat lines');
  return inserted;
}
