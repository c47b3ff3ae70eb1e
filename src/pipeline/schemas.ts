import { z } from 'zod';

// Counting stats are optional in the feed and default to zero.
const count = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((v) => v ?? 0);

const externalId = z.number().int();

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const score = z
  .number()
  .int()
  .nullish()
  .transform((v) => v ?? null);

export const snapshotTeamSchema = z.object({
  id: externalId,
  name: z.string().min(1),
  venue: z
    .object({ name: optionalText })
    .nullish()
    .transform((v) => v?.name ?? null),
  locationName: optionalText,
});

export const snapshotRosterEntrySchema = z.object({
  person: z.object({
    id: externalId,
    fullName: z.string().min(1),
  }),
  position: z
    .object({ abbreviation: optionalText })
    .nullish()
    .transform((v) => v?.abbreviation ?? 'NA'),
});

// A game with a missing team reference still parses; the resolver skips it.
const teamReference = externalId.nullish().transform((v) => v ?? null);

export const snapshotGameSchema = z.object({
  game_id: externalId,
  game_date: optionalText,
  location: optionalText,
  home_team_id: teamReference,
  away_team_id: teamReference,
  home_team_score: score,
  away_team_score: score,
});

export const snapshotBatterStatSchema = z.object({
  game_id: externalId,
  player_id: externalId,
  at_bats: count,
  runs: count,
  hits: count,
  doubles: count,
  triples: count,
  home_runs: count,
  rbi: count,
  walks: count,
  hit_by_pitch: count,
  strikeouts: count,
  stolen_bases: count,
  caught_stealing: count,
  sac_flies: count,
  total_bases: count,
});

export const snapshotPitcherStatSchema = z.object({
  game_id: externalId,
  player_id: externalId,
  innings_pitched: z
    .number()
    .nonnegative()
    .nullish()
    .transform((v) => v ?? 0),
  hits_allowed: count,
  runs_allowed: count,
  earned_runs: count,
  home_runs_allowed: count,
  walks_allowed: count,
  strikeouts: count,
});

/**
 * Envelope of one ingestion unit. Unknown top-level keys (e.g. the raw schedule)
 * are dropped. Games and stat rows are only checked to be arrays here; the
 * reader validates them one record at a time so a bad record costs only itself.
 */
export const snapshotEnvelopeSchema = z.object({
  teams: z.array(snapshotTeamSchema).default([]),
  rosters: z.record(z.string(), z.array(snapshotRosterEntrySchema)).default({}),
  games: z.array(z.unknown()).default([]),
  batter_stats: z.array(z.unknown()).default([]),
  pitcher_stats: z.array(z.unknown()).default([]),
});

export type SnapshotTeam = z.infer<typeof snapshotTeamSchema>;
export type SnapshotRosterEntry = z.infer<typeof snapshotRosterEntrySchema>;
export type SnapshotGame = z.infer<typeof snapshotGameSchema>;
export type SnapshotBatterStat = z.infer<typeof snapshotBatterStatSchema>;
export type SnapshotPitcherStat = z.infer<typeof snapshotPitcherStatSchema>;
export type SnapshotGameDocument = z.input<typeof snapshotGameSchema>;
export type SnapshotBatterStatDocument = z.input<typeof snapshotBatterStatSchema>;
export type SnapshotPitcherStatDocument = z.input<typeof snapshotPitcherStatSchema>;

/** Per-section count of records dropped because they failed validation. */
export interface RejectedRecords {
  games: number;
  batterStats: number;
  pitcherStats: number;
}

export interface Snapshot {
  teams: SnapshotTeam[];
  rosters: Record<string, SnapshotRosterEntry[]>;
  games: SnapshotGame[];
  batter_stats: SnapshotBatterStat[];
  pitcher_stats: SnapshotPitcherStat[];
  rejected: RejectedRecords;
}
