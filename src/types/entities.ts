/** Reference rows as the resolver hands them to storage. External ids come from the stats API. */
export interface TeamInput {
  externalId: number;
  name: string;
  venue: string | null;
  city: string | null;
}

export interface PlayerInput {
  externalId: number;
  name: string;
  /** Internal team id. Only used on first insert; later snapshots never move a player. */
  teamId: number;
  position: string;
}

export interface GameInput {
  externalId: number;
  /** ISO timestamp, e.g. '2024-04-01T17:05:00Z' */
  gameDate: string | null;
  venue: string | null;
  homeTeamId: number;
  awayTeamId: number;
  homeScore: number | null;
  awayScore: number | null;
}

export interface BattingCounts {
  atBats: number;
  runs: number;
  hits: number;
  doubles: number;
  triples: number;
  homeRuns: number;
  rbi: number;
  walks: number;
  hitByPitch: number;
  strikeouts: number;
  stolenBases: number;
  caughtStealing: number;
  sacFlies: number;
  totalBases: number;
}

export interface RateStats {
  avg: number;
  obp: number;
  slg: number;
  ops: number;
}

export interface BatterStatRow extends BattingCounts, RateStats {
  gameId: number;
  playerId: number;
}

export interface PitcherStatRow {
  gameId: number;
  playerId: number;
  /** Box-score notation: 5.2 means five and two-thirds innings. */
  inningsPitched: number;
  hitsAllowed: number;
  runsAllowed: number;
  earnedRuns: number;
  homeRunsAllowed: number;
  walksAllowed: number;
  strikeouts: number;
}

export type StatKind = 'batter' | 'pitcher';

/** Inclusive calendar range, both ends 'YYYY-MM-DD'. */
export interface DateRange {
  start: string;
  end: string;
}

export interface ProcessedRange extends DateRange {
  id: number;
  sourceToken: string;
  processedAt: Date;
}

export interface TableCounts {
  teams: number;
  players: number;
  games: number;
  batterStats: number;
  pitcherStats: number;
  processedRanges: number;
}
