import type { TransactionSql } from 'postgres';
import type {
  BatterStatRow,
  DateRange,
  GameInput,
  PitcherStatRow,
  PlayerInput,
  ProcessedRange,
  TableCounts,
  TeamInput,
} from '../types/entities.js';

// Every statement runs on a transaction handle. The store opens a short
// transaction for standalone reads and shares one across a load.

// ===== Reference data =====

export async function upsertTeam(db: TransactionSql, team: TeamInput): Promise<number | undefined> {
  const [row] = await db<{ id: number }[]>`
    INSERT INTO teams (external_id, name, venue, city)
    VALUES (${team.externalId}, ${team.name}, ${team.venue}, ${team.city})
    ON CONFLICT (external_id) DO UPDATE SET external_id = EXCLUDED.external_id
    RETURNING id
  `;
  return row?.id;
}

export async function upsertPlayer(db: TransactionSql, player: PlayerInput): Promise<number | undefined> {
  // team_id is not touched on conflict; the first-seen team sticks.
  const [row] = await db<{ id: number }[]>`
    INSERT INTO players (external_id, name, team_id, position)
    VALUES (${player.externalId}, ${player.name}, ${player.teamId}, ${player.position})
    ON CONFLICT (external_id) DO UPDATE SET external_id = EXCLUDED.external_id
    RETURNING id
  `;
  return row?.id;
}

export async function upsertGame(db: TransactionSql, game: GameInput): Promise<number | undefined> {
  const [row] = await db<{ id: number }[]>`
    INSERT INTO games (external_id, game_date, venue, home_team_id, away_team_id, home_score, away_score)
    VALUES (
      ${game.externalId}, ${game.gameDate}, ${game.venue},
      ${game.homeTeamId}, ${game.awayTeamId},
      ${game.homeScore}, ${game.awayScore}
    )
    ON CONFLICT (external_id) DO UPDATE SET external_id = EXCLUDED.external_id
    RETURNING id
  `;
  return row?.id;
}

// ===== Stat lines =====

// postgres.js caps one statement at 65534 bind parameters; 1000 rows of the
// widest stat table (20 columns) stays well under it.
export const STAT_INSERT_CHUNK_ROWS = 1000;

export function chunkRows<T>(rows: T[], size: number = STAT_INSERT_CHUNK_ROWS): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

export async function insertBatterStats(db: TransactionSql, rows: BatterStatRow[]): Promise<number> {
  if (rows.length === 0) return 0;

  const records = rows.map((r) => ({
    game_id: r.gameId,
    player_id: r.playerId,
    at_bats: r.atBats,
    runs: r.runs,
    hits: r.hits,
    doubles: r.doubles,
    triples: r.triples,
    home_runs: r.homeRuns,
    rbi: r.rbi,
    walks: r.walks,
    hit_by_pitch: r.hitByPitch,
    strikeouts: r.strikeouts,
    stolen_bases: r.stolenBases,
    caught_stealing: r.caughtStealing,
    sac_flies: r.sacFlies,
    total_bases: r.totalBases,
    avg: r.avg,
    obp: r.obp,
    slg: r.slg,
    ops: r.ops,
  }));

  let inserted = 0;
  for (const chunk of chunkRows(records)) {
    const result = await db`
      INSERT INTO batter_stats ${db(chunk)}
      ON CONFLICT (game_id, player_id) DO NOTHING
    `;
    inserted += result.count;
  }
  return inserted;
}

export async function insertPitcherStats(db: TransactionSql, rows: PitcherStatRow[]): Promise<number> {
  if (rows.length === 0) return 0;

  const records = rows.map((r) => ({
    game_id: r.gameId,
    player_id: r.playerId,
    innings_pitched: r.inningsPitched,
    hits_allowed: r.hitsAllowed,
    runs_allowed: r.runsAllowed,
    earned_runs: r.earnedRuns,
    home_runs_allowed: r.homeRunsAllowed,
    walks_allowed: r.walksAllowed,
    strikeouts: r.strikeouts,
  }));

  let inserted = 0;
  for (const chunk of chunkRows(records)) {
    const result = await db`
      INSERT INTO pitcher_stats ${db(chunk)}
      ON CONFLICT (game_id, player_id) DO NOTHING
    `;
    inserted += result.count;
  }
  return inserted;
}

// ===== Processed ranges =====

interface ProcessedRangeRow {
  id: number;
  source_token: string;
  start_date: string;
  end_date: string;
  processed_at: Date;
}

function toProcessedRange(row: ProcessedRangeRow): ProcessedRange {
  return {
    id: row.id,
    sourceToken: row.source_token,
    start: row.start_date,
    end: row.end_date,
    processedAt: row.processed_at,
  };
}

export async function findOverlappingRange(db: TransactionSql, range: DateRange): Promise<ProcessedRange | null> {
  const [row] = await db<ProcessedRangeRow[]>`
    SELECT id, source_token,
           to_char(start_date, 'YYYY-MM-DD') AS start_date,
           to_char(end_date, 'YYYY-MM-DD') AS end_date,
           processed_at
    FROM processed_ranges
    WHERE start_date <= ${range.end}::date
      AND ${range.start}::date <= end_date
    ORDER BY start_date
    LIMIT 1
  `;
  return row ? toProcessedRange(row) : null;
}

export async function findRangeByToken(db: TransactionSql, sourceToken: string): Promise<ProcessedRange | null> {
  const [row] = await db<ProcessedRangeRow[]>`
    SELECT id, source_token,
           to_char(start_date, 'YYYY-MM-DD') AS start_date,
           to_char(end_date, 'YYYY-MM-DD') AS end_date,
           processed_at
    FROM processed_ranges
    WHERE source_token = ${sourceToken}
  `;
  return row ? toProcessedRange(row) : null;
}

export async function recordRange(db: TransactionSql, sourceToken: string, range: DateRange): Promise<void> {
  await db`
    INSERT INTO processed_ranges (source_token, start_date, end_date)
    VALUES (${sourceToken}, ${range.start}::date, ${range.end}::date)
  `;
}

// ===== Reporting =====

export async function countRows(db: TransactionSql): Promise<TableCounts> {
  const [row] = await db<{
    teams: number;
    players: number;
    games: number;
    batter_stats: number;
    pitcher_stats: number;
    processed_ranges: number;
  }[]>`
    SELECT
      (SELECT count(*)::int FROM teams) AS teams,
      (SELECT count(*)::int FROM players) AS players,
      (SELECT count(*)::int FROM games) AS games,
      (SELECT count(*)::int FROM batter_stats) AS batter_stats,
      (SELECT count(*)::int FROM pitcher_stats) AS pitcher_stats,
      (SELECT count(*)::int FROM processed_ranges) AS processed_ranges
  `;

  return {
    teams: row?.teams ?? 0,
    players: row?.players ?? 0,
    games: row?.games ?? 0,
    batterStats: row?.batter_stats ?? 0,
    pitcherStats: row?.pitcher_stats ?? 0,
    processedRanges: row?.processed_ranges ?? 0,
  };
}

export async function listProcessedRanges(db: TransactionSql): Promise<ProcessedRange[]> {
  const rows = await db<ProcessedRangeRow[]>`
    SELECT id, source_token,
           to_char(start_date, 'YYYY-MM-DD') AS start_date,
           to_char(end_date, 'YYYY-MM-DD') AS end_date,
           processed_at
    FROM processed_ranges
    ORDER BY start_date
  `;
  return rows.map(toProcessedRange);
}

export interface HomeRunPair {
  player1: string;
  player2: string;
  frequency: number;
}

/**
 * Pairs of players who both homered on the same calendar day, most frequent first.
 */
export async function findHomeRunPairs(
  db: TransactionSql,
  options: { excludePlayerName?: string; limit?: number } = {},
): Promise<HomeRunPair[]> {
  const exclude = options.excludePlayerName;
  const limit = options.limit ?? 10;

  const rows = await db<HomeRunPair[]>`
    WITH hr_days AS (
      SELECT bs.player_id, g.game_date::date AS game_day
      FROM batter_stats bs
      JOIN games g ON g.id = bs.game_id
      WHERE bs.home_runs > 0 AND g.game_date IS NOT NULL
      GROUP BY bs.player_id, game_day
    )
    SELECT p1.name AS player1, p2.name AS player2, count(*)::int AS frequency
    FROM hr_days h1
    JOIN hr_days h2 ON h1.game_day = h2.game_day AND h1.player_id < h2.player_id
    JOIN players p1 ON p1.id = h1.player_id
    JOIN players p2 ON p2.id = h2.player_id
    ${exclude ? db`WHERE p1.name <> ${exclude} AND p2.name <> ${exclude}` : db``}
    GROUP BY p1.name, p2.name
    ORDER BY frequency DESC, player1, player2
    LIMIT ${limit}
  `;
  return [...rows];
}
