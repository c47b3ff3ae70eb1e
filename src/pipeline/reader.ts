import fs from 'node:fs';
import type { ZodError } from 'zod';
import {
  snapshotBatterStatSchema,
  snapshotEnvelopeSchema,
  snapshotGameSchema,
  snapshotPitcherStatSchema,
  type Snapshot,
} from './schemas.js';
import { SnapshotFormatError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

type RecordResult<T> = { success: true; data: T } | { success: false; error: ZodError };

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected shape';
}

/** Keep the records that validate; log and count the rest. */
function keepValid<T>(
  section: string,
  records: unknown[],
  parse: (record: unknown) => RecordResult<T>,
  log: Logger,
): { valid: T[]; rejected: number } {
  const valid: T[] = [];
  let rejected = 0;

  records.forEach((record, index) => {
    const result = parse(record);
    if (result.success) {
      valid.push(result.data);
      return;
    }
    rejected++;
    log.warn({ section, index, issue: describeIssue(result.error) }, 'Dropping record that failed validation');
  });

  return { valid, rejected };
}

/**
 * Validate a parsed unit document. The envelope (section types, teams, rosters)
 * must be well formed or SnapshotFormatError is thrown; a game or stat row that
 * fails validation is dropped and counted under `rejected`.
 */
export function parseSnapshot(document: unknown, source: string, log: Logger = rootLogger): Snapshot {
  const envelope = snapshotEnvelopeSchema.safeParse(document);
  if (!envelope.success) {
    throw new SnapshotFormatError(source, describeIssue(envelope.error), { cause: envelope.error });
  }
  const { teams, rosters, games, batter_stats, pitcher_stats } = envelope.data;

  const validGames = keepValid('games', games, (r) => snapshotGameSchema.safeParse(r), log);
  const batter = keepValid('batter_stats', batter_stats, (r) => snapshotBatterStatSchema.safeParse(r), log);
  const pitcher = keepValid('pitcher_stats', pitcher_stats, (r) => snapshotPitcherStatSchema.safeParse(r), log);

  return {
    teams,
    rosters,
    games: validGames.valid,
    batter_stats: batter.valid,
    pitcher_stats: pitcher.valid,
    rejected: {
      games: validGames.rejected,
      batterStats: batter.rejected,
      pitcherStats: pitcher.rejected,
    },
  };
}

/**
 * Load one ingestion unit from disk.
 * Throws SnapshotFormatError for bad JSON or a malformed envelope; fs errors propagate as-is.
 */
export function readSnapshot(filePath: string, log: Logger = rootLogger): Snapshot {
  const raw = fs.readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SnapshotFormatError(filePath, 'not valid JSON', { cause: err });
  }

  return parseSnapshot(parsed, filePath, log);
}
