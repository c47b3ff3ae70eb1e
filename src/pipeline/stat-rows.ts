import type { BatterStatRow, PitcherStatRow } from '../types/entities.js';
import type { SnapshotBatterStat, SnapshotPitcherStat } from './schemas.js';
import type { EntityMapping } from './entity-resolver.js';
import { deriveRates } from './stat-deriver.js';

export interface BuiltRows<T> {
  rows: T[];
  /** Raw rows dropped because their game or player was not resolved in this unit. */
  skipped: number;
}

function resolveKeys(
  mapping: EntityMapping,
  stat: { game_id: number; player_id: number },
): { gameId: number; playerId: number } | null {
  const gameId = mapping.games.get(stat.game_id);
  const playerId = mapping.players.get(stat.player_id);
  if (gameId === undefined || playerId === undefined) return null;
  return { gameId, playerId };
}

export function buildBatterRows(stats: SnapshotBatterStat[], mapping: EntityMapping): BuiltRows<BatterStatRow> {
  const rows: BatterStatRow[] = [];
  let skipped = 0;

  for (const stat of stats) {
    const keys = resolveKeys(mapping, stat);
    if (!keys) {
      skipped++;
      continue;
    }

    const counts = {
      atBats: stat.at_bats,
      runs: stat.runs,
      hits: stat.hits,
      doubles: stat.doubles,
      triples: stat.triples,
      homeRuns: stat.home_runs,
      rbi: stat.rbi,
      walks: stat.walks,
      hitByPitch: stat.hit_by_pitch,
      strikeouts: stat.strikeouts,
      stolenBases: stat.stolen_bases,
      caughtStealing: stat.caught_stealing,
      sacFlies: stat.sac_flies,
      totalBases: stat.total_bases,
    };

    rows.push({ ...keys, ...counts, ...deriveRates(counts) });
  }

  return { rows, skipped };
}

export function buildPitcherRows(stats: SnapshotPitcherStat[], mapping: EntityMapping): BuiltRows<PitcherStatRow> {
  const rows: PitcherStatRow[] = [];
  let skipped = 0;

  for (const stat of stats) {
    const keys = resolveKeys(mapping, stat);
    if (!keys) {
      skipped++;
      continue;
    }

    rows.push({
      ...keys,
      inningsPitched: stat.innings_pitched,
      hitsAllowed: stat.hits_allowed,
      runsAllowed: stat.runs_allowed,
      earnedRuns: stat.earned_runs,
      homeRunsAllowed: stat.home_runs_allowed,
      walksAllowed: stat.walks_allowed,
      strikeouts: stat.strikeouts,
    });
  }

  return { rows, skipped };
}
