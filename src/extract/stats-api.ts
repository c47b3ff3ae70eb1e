import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { DateRange } from '../types/entities.js';
import { TransientRetrievalError } from '../errors.js';
import { HostRateLimiter } from './rate-limiter.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'mlb-ingest/0.1 (research project)',
  Accept: 'application/json',
};

// Response shapes. Only the fields the extractor reads are checked; the rest
// is passed through untouched into the snapshot.

const apiTeamSchema = z
  .object({
    id: z.number().int(),
    name: z.string().min(1),
    venue: z.object({ name: z.string().optional() }).passthrough().optional(),
    locationName: z.string().optional(),
  })
  .passthrough();

const apiRosterEntrySchema = z
  .object({
    person: z.object({ id: z.number().int(), fullName: z.string().min(1) }).passthrough(),
    position: z.object({ abbreviation: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const apiScheduleTeamSchema = z
  .object({
    team: z.object({ id: z.number().int() }).passthrough(),
    score: z.number().int().optional(),
  })
  .passthrough();

export const apiScheduleGameSchema = z
  .object({
    gamePk: z.number().int(),
    gameDate: z.string().optional(),
    venue: z.object({ name: z.string().optional() }).passthrough().optional(),
    teams: z.object({ home: apiScheduleTeamSchema, away: apiScheduleTeamSchema }).passthrough(),
  })
  .passthrough();

const apiScheduleSchema = z
  .object({
    dates: z
      .array(z.object({ games: z.array(apiScheduleGameSchema).default([]) }).passthrough())
      .default([]),
  })
  .passthrough();

const statBlockSchema = z.record(z.string(), z.unknown());

const apiBoxscorePlayerSchema = z
  .object({
    person: z.object({ id: z.number().int() }).passthrough(),
    stats: z
      .object({ batting: statBlockSchema.optional(), pitching: statBlockSchema.optional() })
      .passthrough()
      .default({}),
  })
  .passthrough();

const apiBoxscoreSideSchema = z
  .object({ players: z.record(z.string(), apiBoxscorePlayerSchema).default({}) })
  .passthrough();

export const apiBoxscoreSchema = z
  .object({
    teams: z
      .object({ home: apiBoxscoreSideSchema.optional(), away: apiBoxscoreSideSchema.optional() })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type ApiTeam = z.infer<typeof apiTeamSchema>;
export type ApiRosterEntry = z.infer<typeof apiRosterEntrySchema>;
export type ApiScheduleGame = z.infer<typeof apiScheduleGameSchema>;
export type ApiSchedule = z.infer<typeof apiScheduleSchema>;
export type ApiBoxscore = z.infer<typeof apiBoxscoreSchema>;
export type StatBlock = z.infer<typeof statBlockSchema>;

export interface StatsApiOptions {
  baseUrl: string;
  /** Minimum gap between two requests to the same host. */
  minDelayMs: number;
  /** Overrides undici's global dispatcher, e.g. with a MockAgent. */
  dispatcher?: Dispatcher;
  log?: Logger;
}

interface JsonResponse {
  status: number;
  data: unknown;
}

/**
 * Read-only client for the public MLB stats API.
 * Network errors, 429 and 5xx raise TransientRetrievalError.
 */
export class StatsApiClient {
  private readonly log: Logger;
  private readonly limiter: HostRateLimiter;

  constructor(private readonly options: StatsApiOptions) {
    this.log = (options.log ?? rootLogger).child({ component: 'stats-api' });
    this.limiter = new HostRateLimiter(options.minDelayMs);
  }

  async getTeams(season: string): Promise<ApiTeam[]> {
    const res = await this.getJson('/teams', { activeStatus: 'Y', sportId: '1', season });
    const data = this.requireOk(res, '/teams');
    const teams = z.object({ teams: z.array(apiTeamSchema).default([]) }).parse(data).teams;
    this.log.info({ count: teams.length }, 'Retrieved teams');
    return teams;
  }

  /** Empty when the API has no roster for the team. */
  async getRoster(teamId: number, season: string): Promise<ApiRosterEntry[]> {
    const res = await this.getJson(`/teams/${teamId}/roster`, { season, rosterType: 'active' });
    if (res.status !== 200) {
      this.log.warn({ teamId, status: res.status }, 'Failed to fetch roster');
      return [];
    }
    return z.object({ roster: z.array(apiRosterEntrySchema).default([]) }).parse(res.data).roster;
  }

  async getSchedule(season: string, range: DateRange): Promise<ApiSchedule> {
    const res = await this.getJson('/schedule', {
      season,
      startDate: range.start,
      endDate: range.end,
      sportId: '1',
    });
    return apiScheduleSchema.parse(this.requireOk(res, '/schedule'));
  }

  /** null when the API has no boxscore for the game. */
  async getBoxscore(gamePk: number): Promise<ApiBoxscore | null> {
    const res = await this.getJson(`/game/${gamePk}/boxscore`);
    if (res.status !== 200) {
      this.log.warn({ gamePk, status: res.status }, 'Failed to fetch boxscore');
      return null;
    }
    return apiBoxscoreSchema.parse(res.data);
  }

  private requireOk(res: JsonResponse, path: string): unknown {
    if (res.status !== 200) {
      throw new TransientRetrievalError(`${this.options.baseUrl}${path}`, res.status);
    }
    return res.data;
  }

  private async getJson(path: string, query: Record<string, string> = {}): Promise<JsonResponse> {
    const qs = new URLSearchParams(query).toString();
    const url = `${this.options.baseUrl}${path}${qs ? `?${qs}` : ''}`;

    await this.limiter.acquire(url);

    let res: Dispatcher.ResponseData;
    try {
      res = await request(url, {
        method: 'GET',
        headers: DEFAULT_HEADERS,
        headersTimeout: 15000,
        bodyTimeout: 30000,
        dispatcher: this.options.dispatcher,
      });
    } catch (err) {
      throw new TransientRetrievalError(url, null, { cause: err });
    }

    if (res.statusCode === 429 || res.statusCode >= 500) {
      await res.body.dump();
      throw new TransientRetrievalError(url, res.statusCode);
    }
    if (res.statusCode !== 200) {
      await res.body.dump();
      return { status: res.statusCode, data: null };
    }

    return { status: res.statusCode, data: await res.body.json() };
  }
}
