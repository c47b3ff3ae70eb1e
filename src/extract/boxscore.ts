import type {
  SnapshotBatterStatDocument,
  SnapshotGameDocument,
  SnapshotPitcherStatDocument,
} from '../pipeline/schemas.js';
import type { ApiBoxscore, ApiScheduleGame, StatBlock } from './stats-api.js';

/**
 * Pure mapping from stats API payloads to snapshot records. No I/O.
 */

function toInt(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : 0;
  if (typeof value === 'string') {
    const n = parseInt(value, 10);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

/** '5.2' -> 5.2 (box-score notation kept as-is); anything unparseable -> 0. */
export function parseInningsPitched(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value !== 'string') return 0;
  const n = Number(value.trim());
  return Number.isFinite(n) && value.trim() !== '' ? n : 0;
}

export function toSnapshotGame(game: ApiScheduleGame): SnapshotGameDocument {
  return {
    game_id: game.gamePk,
    game_date: game.gameDate ?? null,
    location: game.venue?.name ?? 'Unknown',
    home_team_id: game.teams.home.team.id,
    away_team_id: game.teams.away.team.id,
    home_team_score: game.teams.home.score ?? null,
    away_team_score: game.teams.away.score ?? null,
  };
}

function toBatterStat(gameId: number, playerId: number, b: StatBlock): SnapshotBatterStatDocument {
  return {
    game_id: gameId,
    player_id: playerId,
    at_bats: toInt(b['atBats']),
    runs: toInt(b['runs']),
    hits: toInt(b['hits']),
    doubles: toInt(b['doubles']),
    triples: toInt(b['triples']),
    home_runs: toInt(b['homeRuns']),
    rbi: toInt(b['rbi']),
    walks: toInt(b['baseOnBalls']),
    hit_by_pitch: toInt(b['hitByPitch']),
    strikeouts: toInt(b['strikeOuts']),
    stolen_bases: toInt(b['stolenBases']),
    caught_stealing: toInt(b['caughtStealing']),
    total_bases: toInt(b['totalBases']),
    sac_flies: toInt(b['sacFlies']),
  };
}

function toPitcherStat(gameId: number, playerId: number, p: StatBlock): SnapshotPitcherStatDocument {
  return {
    game_id: gameId,
    player_id: playerId,
    innings_pitched: parseInningsPitched(p['inningsPitched']),
    hits_allowed: toInt(p['hits']),
    runs_allowed: toInt(p['runs']),
    earned_runs: toInt(p['earnedRuns']),
    home_runs_allowed: toInt(p['homeRuns']),
    walks_allowed: toInt(p['baseOnBalls']),
    strikeouts: toInt(p['strikeOuts']),
  };
}

/**
 * Flatten both sides of a boxscore into stat records tagged with the game's external id.
 * Players whose batting or pitching block is absent or empty get no record of that kind.
 */
export function parseBoxscoreStats(
  boxscore: ApiBoxscore,
  gameId: number,
): { batter: SnapshotBatterStatDocument[]; pitcher: SnapshotPitcherStatDocument[] } {
  const batter: SnapshotBatterStatDocument[] = [];
  const pitcher: SnapshotPitcherStatDocument[] = [];

  for (const side of [boxscore.teams.home, boxscore.teams.away]) {
    if (!side) continue;
    for (const player of Object.values(side.players)) {
      const { batting, pitching } = player.stats;
      if (batting && Object.keys(batting).length > 0) {
        batter.push(toBatterStat(gameId, player.person.id, batting));
      }
      if (pitching && Object.keys(pitching).length > 0) {
        pitcher.push(toPitcherStat(gameId, player.person.id, pitching));
      }
    }
  }

  return { batter, pitcher };
}
