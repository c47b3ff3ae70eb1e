import type { IngestTx } from '../db/store.js';
import type { GameInput, PlayerInput, TeamInput } from '../types/entities.js';
import type { Snapshot } from './schemas.js';
import { IntegrityError, ReferenceMissingError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

type ReferenceWriter = Pick<IngestTx, 'upsertTeam' | 'upsertPlayer' | 'upsertGame'>;

/** External id -> internal id, built up over one unit and discarded afterwards. */
export interface EntityMapping {
  teams: Map<number, number>;
  teamsByName: Map<string, number>;
  players: Map<number, number>;
  games: Map<number, number>;
}

export function createEntityMapping(): EntityMapping {
  return {
    teams: new Map(),
    teamsByName: new Map(),
    players: new Map(),
    games: new Map(),
  };
}

export class EntityResolver {
  readonly mapping: EntityMapping = createEntityMapping();

  constructor(private readonly db: ReferenceWriter) {}

  async resolveTeam(team: TeamInput): Promise<number> {
    const id = await this.db.upsertTeam(team);
    if (id === undefined) throw new IntegrityError('team', team.externalId);
    this.mapping.teams.set(team.externalId, id);
    this.mapping.teamsByName.set(team.name, id);
    return id;
  }

  async resolvePlayer(player: PlayerInput): Promise<number> {
    const id = await this.db.upsertPlayer(player);
    if (id === undefined) throw new IntegrityError('player', player.externalId);
    this.mapping.players.set(player.externalId, id);
    return id;
  }

  async resolveGame(game: GameInput): Promise<number> {
    const id = await this.db.upsertGame(game);
    if (id === undefined) throw new IntegrityError('game', game.externalId);
    this.mapping.games.set(game.externalId, id);
    return id;
  }

  /** Internal id of a team resolved earlier in this unit; throws ReferenceMissingError otherwise. */
  teamIdFor(gameExternalId: number, teamExternalId: number | null): number {
    const id = teamExternalId === null ? undefined : this.mapping.teams.get(teamExternalId);
    if (id === undefined) throw new ReferenceMissingError(gameExternalId, teamExternalId);
    return id;
  }

  /** Roster keys are either a team's external id (digits only) or its display name. */
  teamIdForRosterKey(key: string): number | undefined {
    if (/^\d+$/.test(key)) return this.mapping.teams.get(Number(key));
    return this.mapping.teamsByName.get(key);
  }
}

export interface ResolutionResult {
  mapping: EntityMapping;
  skippedRosters: string[];
  skippedGames: number[];
}

/**
 * Upsert every team, roster player and game of a snapshot, in that order.
 * Meant to run inside one transaction: an IntegrityError or storage error
 * propagates and takes the whole unit down. Unknown roster keys and games
 * with unresolved teams are skipped with a warning.
 */
export async function resolveSnapshotEntities(
  db: ReferenceWriter,
  snapshot: Snapshot,
  log: Logger,
): Promise<ResolutionResult> {
  const resolver = new EntityResolver(db);
  const skippedRosters: string[] = [];
  const skippedGames: number[] = [];

  for (const team of snapshot.teams) {
    await resolver.resolveTeam({
      externalId: team.id,
      name: team.name,
      venue: team.venue,
      city: team.locationName,
    });
  }

  for (const [teamKey, roster] of Object.entries(snapshot.rosters)) {
    const teamId = resolver.teamIdForRosterKey(teamKey);
    if (teamId === undefined) {
      log.warn({ teamKey, players: roster.length }, 'Roster team not found in team mapping, skipping roster');
      skippedRosters.push(teamKey);
      continue;
    }

    for (const entry of roster) {
      await resolver.resolvePlayer({
        externalId: entry.person.id,
        name: entry.person.fullName,
        teamId,
        position: entry.position,
      });
    }
  }

  for (const game of snapshot.games) {
    let homeTeamId: number;
    let awayTeamId: number;
    try {
      homeTeamId = resolver.teamIdFor(game.game_id, game.home_team_id);
      awayTeamId = resolver.teamIdFor(game.game_id, game.away_team_id);
    } catch (err) {
      if (!(err instanceof ReferenceMissingError)) throw err;
      log.warn({ game: game.game_id, team: err.teamExternalId }, 'Missing team mapping for game, skipping game');
      skippedGames.push(game.game_id);
      continue;
    }

    await resolver.resolveGame({
      externalId: game.game_id,
      gameDate: game.game_date,
      venue: game.location,
      homeTeamId,
      awayTeamId,
      homeScore: game.home_team_score,
      awayScore: game.away_team_score,
    });
  }

  log.info(
    {
      teams: resolver.mapping.teams.size,
      players: resolver.mapping.players.size,
      games: resolver.mapping.games.size,
      skippedGames: skippedGames.length,
    },
    'Reference data resolved',
  );

  return { mapping: resolver.mapping, skippedRosters, skippedGames };
}
