import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import postgres from 'postgres';
import { PostgresIngestStore } from '../../src/db/postgres-store.js';
import { findHomeRunPairs } from '../../src/db/queries.js';
import { runMigrations } from '../../migrations/runner.js';
import { StorageError } from '../../src/errors.js';
import type { BatterStatRow } from '../../src/types/entities.js';

// Run with `npm run test:db` against a throwaway database: every table is truncated between tests.
const TEST_DATABASE_URL = process.env['TEST_DATABASE_URL'];
if (!TEST_DATABASE_URL) {
  throw new Error('TEST_DATABASE_URL must point at a disposable Postgres database');
}

const batterRow = (gameId: number, playerId: number, homeRuns = 0): BatterStatRow => ({
  gameId,
  playerId,
  atBats: 4,
  runs: homeRuns,
  hits: 1 + homeRuns,
  doubles: 0,
  triples: 0,
  homeRuns,
  rbi: homeRuns,
  walks: 0,
  hitByPitch: 0,
  strikeouts: 1,
  stolenBases: 0,
  caughtStealing: 0,
  sacFlies: 0,
  totalBases: 1 + 4 * homeRuns,
  avg: 0.25,
  obp: 0.25,
  slg: 0.25,
  ops: 0.5,
});

describe('PostgresIngestStore', () => {
  const sql = postgres(TEST_DATABASE_URL, { max: 2, onnotice: () => {} });
  const store = new PostgresIngestStore(sql);

  beforeAll(async () => {
    await runMigrations(sql);
  });

  beforeEach(async () => {
    await sql`
      TRUNCATE batter_stats, pitcher_stats, games, players, teams, processed_ranges
      RESTART IDENTITY CASCADE
    `;
  });

  afterAll(async () => {
    await store.close();
  });

  async function seedGame() {
    return store.transaction(async (tx) => {
      const home = (await tx.upsertTeam({ externalId: 901, name: 'Riverton Otters', venue: 'Otter Park', city: 'Riverton' })) ?? 0;
      const away = (await tx.upsertTeam({ externalId: 902, name: 'Lakeside Herons', venue: null, city: null })) ?? 0;
      const p1 = (await tx.upsertPlayer({ externalId: 7001, name: 'Sam Placeholder', teamId: home, position: 'RF' })) ?? 0;
      const p2 = (await tx.upsertPlayer({ externalId: 7002, name: 'Alex Example', teamId: away, position: 'P' })) ?? 0;
      const game =
        (await tx.upsertGame({
          externalId: 880001,
          gameDate: '2024-04-02T23:05:00Z',
          venue: 'Otter Park',
          homeTeamId: home,
          awayTeamId: away,
          homeScore: 5,
          awayScore: 3,
        })) ?? 0;
      return { home, away, p1, p2, game };
    });
  }

  it('should return the same id for a repeated upsert without changing the row', async () => {
    const first = await seedGame();
    const again = await store.transaction((tx) =>
      tx.upsertPlayer({ externalId: 7001, name: 'Renamed', teamId: first.away, position: 'C' }),
    );

    expect(again).toBe(first.p1);
    const [row] = await sql<{ name: string; team_id: number }[]>`SELECT name, team_id FROM players WHERE external_id = 7001`;
    expect(row).toEqual({ name: 'Sam Placeholder', team_id: first.home });
  });

  it('should ignore a stat line already stored for the same game and player', async () => {
    const { game, p1 } = await seedGame();

    const inserted = await store.transaction((tx) => tx.insertBatterStats([batterRow(game, p1)]));
    const repeated = await store.transaction((tx) => tx.insertBatterStats([batterRow(game, p1)]));

    expect([inserted, repeated]).toEqual([1, 0]);
    expect((await store.countRows()).batterStats).toBe(1);
  });

  it('should load a batch larger than one statement can carry', async () => {
    const { home, game } = await seedGame();
    // 3300 rows x 20 columns is past the driver's 65534 bind parameter cap for a single statement.
    const rows = await store.transaction(async (tx) => {
      const built: BatterStatRow[] = [];
      for (let i = 0; i < 3300; i++) {
        const playerId =
          (await tx.upsertPlayer({ externalId: 100000 + i, name: `Player ${i}`, teamId: home, position: 'NA' })) ?? 0;
        built.push(batterRow(game, playerId));
      }
      return built;
    });

    const inserted = await store.transaction((tx) => tx.insertBatterStats(rows));

    expect(inserted).toBe(3300);
    expect((await store.countRows()).batterStats).toBe(3300);
  });

  it('should roll back every write when the transaction fails', async () => {
    const { game, p1 } = await seedGame();

    const err = await store
      .transaction(async (tx) => {
        await tx.insertBatterStats([batterRow(game, p1)]);
        await tx.recordRange('mlb_raw_2024-04-01_2024-04-07_a.json', { start: '2024-04-01', end: '2024-04-07' });
        await tx.insertBatterStats([batterRow(game + 1000, p1)]);
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(await store.countRows()).toMatchObject({ batterStats: 0, processedRanges: 0, games: 1 });
  });

  it('should find recorded ranges by token and by overlap', async () => {
    await store.recordRange('mlb_raw_2024-04-01_2024-04-07_a.json', { start: '2024-04-01', end: '2024-04-07' });

    expect(await store.findRangeByToken('mlb_raw_2024-04-01_2024-04-07_a.json')).toMatchObject({
      start: '2024-04-01',
      end: '2024-04-07',
    });
    expect(await store.findOverlappingRange({ start: '2024-04-07', end: '2024-04-09' })).toMatchObject({
      sourceToken: 'mlb_raw_2024-04-01_2024-04-07_a.json',
    });
    expect(await store.findOverlappingRange({ start: '2024-04-08', end: '2024-04-14' })).toBeNull();
  });

  it('should reject a start date after the end date', async () => {
    await expect(
      store.recordRange('bad', { start: '2024-04-09', end: '2024-04-01' }),
    ).rejects.toBeInstanceOf(StorageError);
  });

  it('should report driver failures from every read as StorageError', async () => {
    const missing = new URL(TEST_DATABASE_URL);
    missing.pathname = '/mlb_ingest_does_not_exist';
    const broken = new PostgresIngestStore(postgres(missing.toString(), { max: 1, onnotice: () => {} }));

    try {
      await expect(broken.listProcessedRanges()).rejects.toBeInstanceOf(StorageError);
      await expect(broken.countRows()).rejects.toBeInstanceOf(StorageError);
      await expect(broken.findRangeByToken('any')).rejects.toBeInstanceOf(StorageError);
    } finally {
      await broken.close();
    }
  });

  it('should pair players who homered on the same day', async () => {
    const { game, p1, p2 } = await seedGame();
    await store.transaction((tx) => tx.insertBatterStats([batterRow(game, p1, 1), batterRow(game, p2, 2)]));

    const pairs = await sql.begin((tx) => findHomeRunPairs(tx));
    const excluded = await sql.begin((tx) => findHomeRunPairs(tx, { excludePlayerName: 'Alex Example' }));

    expect(pairs).toEqual([{ player1: 'Sam Placeholder', player2: 'Alex Example', frequency: 1 }]);
    expect(excluded).toEqual([]);
  });
});
