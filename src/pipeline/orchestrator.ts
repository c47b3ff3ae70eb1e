import fs from 'node:fs';
import path from 'node:path';
import type { IngestStore } from '../db/store.js';
import type { DateRange } from '../types/entities.js';
import { MalformedTokenWarning } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { readSnapshot } from './reader.js';
import { resolveSnapshotEntities } from './entity-resolver.js';
import { buildBatterRows, buildPitcherRows } from './stat-rows.js';
import { loadStatLines } from './batch-loader.js';
import { IngestionLedger, parseSourceToken } from './ledger.js';

export interface PipelineOptions {
  store: IngestStore;
  /** Where pending snapshots wait. A failed unit stays here for the next run. */
  intakeDir: string;
  /** Where committed snapshots are moved, under the same file name. */
  archiveDir: string;
  log?: Logger;
}

export type UnitState = 'discovered' | 'range_checked' | 'skipped' | 'loading' | 'committed' | 'failed';

export type SkipReason = 'overlap' | 'already-recorded';

export type UnitOutcome =
  | {
      token: string;
      state: 'committed';
      /** null when the token carried no parsable range and the unit bypassed the ledger */
      range: DateRange | null;
      inserted: { batter: number; pitcher: number };
      /** Games left out for an unresolved team reference or a failed validation. */
      skippedGames: number;
      /** Stat rows left out for an unresolved game or player or a failed validation. */
      droppedRows: { batter: number; pitcher: number };
      archived: boolean;
    }
  | { token: string; state: 'skipped'; reason: SkipReason; overlapsWith: string | null }
  | { token: string; state: 'failed'; error: Error };

export interface BatchSummary {
  committed: string[];
  skipped: string[];
  failed: string[];
  outcomes: UnitOutcome[];
}

/** Pending units in the intake directory, oldest token first. */
export function discoverUnits(intakeDir: string): string[] {
  if (!fs.existsSync(intakeDir)) return [];
  return fs
    .readdirSync(intakeDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .sort();
}

/** Move a unit into the archive directory, falling back to copy + delete across devices. */
export function archiveUnit(intakeDir: string, archiveDir: string, token: string): string {
  const from = path.join(intakeDir, token);
  const to = path.join(archiveDir, token);
  fs.mkdirSync(archiveDir, { recursive: true });

  try {
    fs.renameSync(from, to);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    fs.copyFileSync(from, to);
    fs.unlinkSync(from);
  }
  return to;
}

function tryArchive(options: PipelineOptions, token: string, log: Logger): boolean {
  try {
    const dest = archiveUnit(options.intakeDir, options.archiveDir, token);
    log.info({ dest }, 'Moved processed unit to archive');
    return true;
  } catch (err) {
    // The ledger already holds the unit, so the next run finishes the move instead of reloading.
    log.error({ err }, 'Archive move failed after commit');
    return false;
  }
}

/**
 * Run one unit through range check, load and commit.
 * Never throws: every error ends in a 'failed' outcome with the unit left in place.
 */
export async function processUnit(options: PipelineOptions, token: string): Promise<UnitOutcome> {
  const { store } = options;
  const log = (options.log ?? rootLogger).child({ unit: token });
  const ledger = new IngestionLedger(store);

  let state: UnitState = 'discovered';
  const moveTo = (next: UnitState) => {
    log.debug({ from: state, to: next }, 'Unit state change');
    state = next;
  };

  try {
    // Ledger before intake: a unit whose archive move failed last run must not be reloaded.
    if (await ledger.isRecorded(token)) {
      moveTo('range_checked');
      moveTo('skipped');
      log.info('Unit already recorded in ledger, retrying archive move');
      tryArchive(options, token, log);
      return { token, state: 'skipped', reason: 'already-recorded', overlapsWith: token };
    }

    let range: DateRange | null = null;
    try {
      range = parseSourceToken(token);
    } catch (err) {
      if (!(err instanceof MalformedTokenWarning)) throw err;
      log.warn({ err }, 'Source token does not match expected pattern, processing without overlap check');
    }

    if (range) {
      const overlap = await ledger.findOverlap(range);
      moveTo('range_checked');
      if (overlap) {
        moveTo('skipped');
        log.info(
          { start: range.start, end: range.end, recorded: overlap.sourceToken },
          'Date range overlaps already processed data, skipping unit',
        );
        return { token, state: 'skipped', reason: 'overlap', overlapsWith: overlap.sourceToken };
      }
    } else {
      moveTo('range_checked');
    }

    moveTo('loading');
    const snapshot = readSnapshot(path.join(options.intakeDir, token), log);

    const resolution = await store.transaction((tx) => resolveSnapshotEntities(tx, snapshot, log));

    const batter = buildBatterRows(snapshot.batter_stats, resolution.mapping);
    const pitcher = buildPitcherRows(snapshot.pitcher_stats, resolution.mapping);
    const { rejected } = snapshot;
    const droppedRows = {
      batter: batter.skipped + rejected.batterStats,
      pitcher: pitcher.skipped + rejected.pitcherStats,
    };
    const skippedGames = resolution.skippedGames.length + rejected.games;
    if (droppedRows.batter > 0 || droppedRows.pitcher > 0) {
      log.warn(
        { ...droppedRows, unresolved: { batter: batter.skipped, pitcher: pitcher.skipped } },
        'Dropped stat rows that were invalid or whose game or player was not resolved',
      );
    }

    // Stat lines and the ledger entry commit together; a crash before this point
    // leaves only idempotent reference rows behind.
    const committedRange = range;
    const inserted = await store.transaction(async (tx) => {
      const batterCount = await loadStatLines(tx, { kind: 'batter', rows: batter.rows }, log);
      const pitcherCount = await loadStatLines(tx, { kind: 'pitcher', rows: pitcher.rows }, log);
      if (committedRange) await new IngestionLedger(tx).record(token, committedRange);
      return { batter: batterCount, pitcher: pitcherCount };
    });

    moveTo('committed');
    log.info({ ...inserted, skippedGames, droppedRows }, 'Unit committed');
    const archived = tryArchive(options, token, log);

    return {
      token,
      state: 'committed',
      range,
      inserted,
      skippedGames,
      droppedRows,
      archived,
    };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    log.error({ err: error, state }, 'Unit failed, leaving it in the intake directory');
    moveTo('failed');
    return { token, state: 'failed', error };
  }
}

/**
 * Process every pending unit in order. One unit's failure never stops the batch.
 */
export async function runBatch(options: PipelineOptions): Promise<BatchSummary> {
  const log = options.log ?? rootLogger;
  const tokens = discoverUnits(options.intakeDir);
  log.info({ intakeDir: options.intakeDir, pending: tokens.length }, 'Starting ingest batch');

  const summary: BatchSummary = { committed: [], skipped: [], failed: [], outcomes: [] };

  for (const token of tokens) {
    const outcome = await processUnit(options, token);
    summary.outcomes.push(outcome);
    summary[outcome.state].push(token);
  }

  log.info(
    {
      committed: summary.committed.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
      failedUnits: summary.failed,
    },
    'Ingest batch complete',
  );

  return summary;
}
