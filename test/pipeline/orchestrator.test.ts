import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { discoverUnits, processUnit, runBatch, type PipelineOptions } from '../../src/pipeline/orchestrator.js';
import { SnapshotFormatError, StorageError } from '../../src/errors.js';
import { MemoryIngestStore } from '../helpers/memory-store.js';
import { makeWorkspace, stageUnit } from '../helpers/fixture-loader.js';

const FIRST_WEEK = 'mlb_raw_2024-04-01_2024-04-07_20240408_093015.json';
const OVERLAPPING = 'mlb_raw_2024-04-05_2024-04-10_20240411_080000.json';

describe('discoverUnits', () => {
  it('should return an empty list when the intake directory does not exist', () => {
    const { root } = makeWorkspace();
    expect(discoverUnits(path.join(root, 'missing'))).toEqual([]);
  });

  it('should list only JSON files, sorted by name', () => {
    const { intakeDir } = makeWorkspace();
    fs.writeFileSync(path.join(intakeDir, 'b.json'), '{}');
    fs.writeFileSync(path.join(intakeDir, 'a.json'), '{}');
    fs.writeFileSync(path.join(intakeDir, 'notes.txt'), 'ignore me');
    fs.mkdirSync(path.join(intakeDir, 'nested.json'));

    expect(discoverUnits(intakeDir)).toEqual(['a.json', 'b.json']);
  });
});

describe('pipeline orchestrator', () => {
  let store: MemoryIngestStore;
  let options: PipelineOptions;
  let intakeDir: string;
  let archiveDir: string;

  beforeEach(() => {
    store = new MemoryIngestStore();
    ({ intakeDir, archiveDir } = makeWorkspace());
    options = { store, intakeDir, archiveDir };
  });

  const inIntake = (token: string) => fs.existsSync(path.join(intakeDir, token));
  const inArchive = (token: string) => fs.existsSync(path.join(archiveDir, token));

  it('should load a unit end to end, record its range and archive it', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');

    const summary = await runBatch(options);

    expect(summary.committed).toEqual([FIRST_WEEK]);
    expect(summary.outcomes[0]).toEqual({
      token: FIRST_WEEK,
      state: 'committed',
      range: { start: '2024-04-01', end: '2024-04-07' },
      inserted: { batter: 1, pitcher: 1 },
      skippedGames: 0,
      droppedRows: { batter: 0, pitcher: 0 },
      archived: true,
    });
    expect(await store.countRows()).toEqual({
      teams: 2,
      players: 2,
      games: 1,
      batterStats: 1,
      pitcherStats: 1,
      processedRanges: 1,
    });
    expect(store.state.batterStats[0]).toMatchObject({ avg: 0.5, obp: 0.6, slg: 0.75, ops: 1.35 });
    expect(store.state.processedRanges[0]).toMatchObject({ sourceToken: FIRST_WEEK, start: '2024-04-01', end: '2024-04-07' });
    expect(inIntake(FIRST_WEEK)).toBe(false);
    expect(inArchive(FIRST_WEEK)).toBe(true);
  });

  it('should skip a token that is already recorded without writing anything', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');
    await runBatch(options);
    const before = await store.countRows();
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');

    const outcome = await processUnit(options, FIRST_WEEK);

    expect(outcome).toEqual({ token: FIRST_WEEK, state: 'skipped', reason: 'already-recorded', overlapsWith: FIRST_WEEK });
    expect(await store.countRows()).toEqual(before);
    expect(before).toEqual({
      teams: 2,
      players: 2,
      games: 1,
      batterStats: 1,
      pitcherStats: 1,
      processedRanges: 1,
    });
    expect(inIntake(FIRST_WEEK)).toBe(false);
  });

  it('should leave a unit overlapping a recorded range in the intake directory', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');
    stageUnit(intakeDir, OVERLAPPING, 'orphan-game-unit.json');

    const summary = await runBatch(options);

    expect(summary.committed).toEqual([FIRST_WEEK]);
    expect(summary.skipped).toEqual([OVERLAPPING]);
    expect(summary.outcomes[1]).toEqual({
      token: OVERLAPPING,
      state: 'skipped',
      reason: 'overlap',
      overlapsWith: FIRST_WEEK,
    });
    expect(await store.countRows()).toMatchObject({ games: 1, batterStats: 1, processedRanges: 1 });
    expect(inIntake(OVERLAPPING)).toBe(true);
    expect(inArchive(OVERLAPPING)).toBe(false);
  });

  it('should roll back stat lines and the ledger entry when a load fails, then succeed on retry', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');
    store.failingTables.add('pitcherStats');

    const failed = await processUnit(options, FIRST_WEEK);

    expect(failed.state).toBe('failed');
    if (failed.state !== 'failed') return;
    expect(failed.error).toBeInstanceOf(StorageError);
    expect(failed.error.message).toBe('simulated storage failure writing pitcherStats');
    // Reference rows committed in their own transaction and are kept.
    expect(await store.countRows()).toEqual({
      teams: 2,
      players: 2,
      games: 1,
      batterStats: 0,
      pitcherStats: 0,
      processedRanges: 0,
    });
    expect(inIntake(FIRST_WEEK)).toBe(true);

    store.failingTables.clear();
    const retried = await processUnit(options, FIRST_WEEK);

    expect(retried).toMatchObject({ state: 'committed', inserted: { batter: 1, pitcher: 1 }, archived: true });
    expect(await store.countRows()).toEqual({
      teams: 2,
      players: 2,
      games: 1,
      batterStats: 1,
      pitcherStats: 1,
      processedRanges: 1,
    });
  });

  it('should carry on with the batch after a unit with invalid JSON', async () => {
    const broken = 'mlb_raw_2024-03-01_2024-03-02_20240303_000000.json';
    fs.writeFileSync(path.join(intakeDir, broken), '{"teams": [');
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');

    const summary = await runBatch(options);

    expect(summary.failed).toEqual([broken]);
    expect(summary.committed).toEqual([FIRST_WEEK]);
    const first = summary.outcomes[0];
    expect(first?.state).toBe('failed');
    if (first?.state === 'failed') expect(first.error).toBeInstanceOf(SnapshotFormatError);
    expect(inIntake(broken)).toBe(true);
    expect((await store.countRows()).processedRanges).toBe(1);
  });

  it('should process a unit with a malformed token without recording it', async () => {
    const token = 'snapshot-latest.json';
    stageUnit(intakeDir, token, 'two-team-unit.json');

    const outcome = await processUnit(options, token);

    expect(outcome).toMatchObject({ state: 'committed', range: null, inserted: { batter: 1, pitcher: 1 }, archived: true });
    expect((await store.countRows()).processedRanges).toBe(0);
  });

  it('should report games skipped for unresolved teams and drop their stat lines', async () => {
    const token = 'mlb_raw_2024-04-09_2024-04-10_20240411_080000.json';
    stageUnit(intakeDir, token, 'orphan-game-unit.json');

    const outcome = await processUnit(options, token);

    expect(outcome).toEqual({
      token,
      state: 'committed',
      range: { start: '2024-04-09', end: '2024-04-10' },
      inserted: { batter: 1, pitcher: 0 },
      skippedGames: 1,
      droppedRows: { batter: 2, pitcher: 0 },
      archived: true,
    });
    expect(store.state.players.map((p) => p.externalId)).toEqual([7001]);
    expect(store.state.games.map((g) => g.externalId)).toEqual([880102]);
  });

  it('should skip only the bad game and stat rows of a partly invalid unit', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'partly-invalid-unit.json');

    const outcome = await processUnit(options, FIRST_WEEK);

    expect(outcome).toEqual({
      token: FIRST_WEEK,
      state: 'committed',
      range: { start: '2024-04-01', end: '2024-04-07' },
      inserted: { batter: 1, pitcher: 1 },
      skippedGames: 1,
      droppedRows: { batter: 1, pitcher: 1 },
      archived: true,
    });
    expect(await store.countRows()).toEqual({
      teams: 2,
      players: 2,
      games: 1,
      batterStats: 1,
      pitcherStats: 1,
      processedRanges: 1,
    });
    expect(store.state.games.map((g) => g.externalId)).toEqual([880001]);
    expect(store.state.pitcherStats[0]?.strikeouts).toBe(7);
  });

  it('should keep a committed unit whose archive move fails and finish the move next run', async () => {
    stageUnit(intakeDir, FIRST_WEEK, 'two-team-unit.json');
    fs.writeFileSync(archiveDir, 'not a directory');

    const first = await processUnit(options, FIRST_WEEK);

    expect(first).toMatchObject({ state: 'committed', archived: false });
    expect(inIntake(FIRST_WEEK)).toBe(true);

    fs.rmSync(archiveDir);
    const second = await processUnit(options, FIRST_WEEK);

    expect(second).toMatchObject({ state: 'skipped', reason: 'already-recorded' });
    expect(inIntake(FIRST_WEEK)).toBe(false);
    expect(inArchive(FIRST_WEEK)).toBe(true);
    expect((await store.countRows()).batterStats).toBe(1);
  });
});
