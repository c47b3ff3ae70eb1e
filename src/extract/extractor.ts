import fs from 'node:fs';
import path from 'node:path';
import type { DateRange } from '../types/entities.js';
import type {
  SnapshotBatterStatDocument,
  SnapshotGameDocument,
  SnapshotPitcherStatDocument,
} from '../pipeline/schemas.js';
import type { ApiRosterEntry, ApiSchedule, ApiTeam, StatsApiClient } from './stats-api.js';
import { parseBoxscoreStats, toSnapshotGame } from './boxscore.js';
import { fileTimestamp } from '../utils/date.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/** A unit as written to the intake directory, with the raw schedule kept for reference. */
export interface ExtractedSnapshot {
  teams: ApiTeam[];
  rosters: Record<string, ApiRosterEntry[]>;
  schedule: ApiSchedule;
  games: SnapshotGameDocument[];
  batter_stats: SnapshotBatterStatDocument[];
  pitcher_stats: SnapshotPitcherStatDocument[];
}

/** Source token for a unit: mlb_raw_<start>_<end>_<YYYYMMDD_HHMMSS>.json */
export function snapshotFileName(range: DateRange, now: Date): string {
  return `mlb_raw_${range.start}_${range.end}_${fileTimestamp(now)}.json`;
}

/**
 * Pull one date window from the stats API and assemble it into a snapshot.
 * Rosters are keyed by team display name. Games without a boxscore keep
 * their game record but contribute no stat lines.
 */
export async function extractSnapshot(
  client: StatsApiClient,
  range: DateRange,
  season: string,
  log: Logger = rootLogger,
): Promise<ExtractedSnapshot> {
  const teams = await client.getTeams(season);

  const rosters: Record<string, ApiRosterEntry[]> = {};
  for (const team of teams) {
    rosters[team.name] = await client.getRoster(team.id, season);
  }
  log.info({ count: Object.keys(rosters).length }, 'Team rosters fetched');

  const schedule = await client.getSchedule(season, range);

  const games: SnapshotGameDocument[] = [];
  const batterStats: SnapshotBatterStatDocument[] = [];
  const pitcherStats: SnapshotPitcherStatDocument[] = [];

  for (const date of schedule.dates) {
    for (const game of date.games) {
      const record = toSnapshotGame(game);
      games.push(record);

      const boxscore = await client.getBoxscore(game.gamePk);
      if (!boxscore) continue;
      const stats = parseBoxscoreStats(boxscore, record.game_id);
      batterStats.push(...stats.batter);
      pitcherStats.push(...stats.pitcher);
    }
  }

  log.info(
    { games: games.length, batterStats: batterStats.length, pitcherStats: pitcherStats.length },
    'Schedule and boxscores extracted',
  );

  return {
    teams,
    rosters,
    schedule,
    games,
    batter_stats: batterStats,
    pitcher_stats: pitcherStats,
  };
}

/** Write a snapshot into the intake directory. Returns the full path. */
export function writeSnapshot(
  dir: string,
  range: DateRange,
  snapshot: ExtractedSnapshot,
  now: Date = new Date(),
): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, snapshotFileName(range, now));
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2), 'utf-8');
  return filePath;
}
