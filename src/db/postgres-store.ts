import postgres, { type Sql, type TransactionSql } from 'postgres';
import type { IngestStore, IngestTx } from './store.js';
import * as queries from './queries.js';
import { StorageError } from '../errors.js';
import type { DateRange, ProcessedRange, TableCounts } from '../types/entities.js';

function createTx(tx: TransactionSql): IngestTx {
  return {
    upsertTeam: (team) => queries.upsertTeam(tx, team),
    upsertPlayer: (player) => queries.upsertPlayer(tx, player),
    upsertGame: (game) => queries.upsertGame(tx, game),
    insertBatterStats: (rows) => queries.insertBatterStats(tx, rows),
    insertPitcherStats: (rows) => queries.insertPitcherStats(tx, rows),
    findOverlappingRange: (range) => queries.findOverlappingRange(tx, range),
    findRangeByToken: (token) => queries.findRangeByToken(tx, token),
    recordRange: (token, range) => queries.recordRange(tx, token, range),
  };
}

const CONNECTION_CODE = /^(E[A-Z]+|CONNECT_TIMEOUT|CONNECTION_[A-Z_]+)$/;

/** Driver and connection failures become StorageError; anything else passes through. */
export function toStorageError(err: unknown, context: string): unknown {
  if (err instanceof postgres.PostgresError) {
    return new StorageError(`${context}: ${err.message}`, { cause: err });
  }
  // Connection failures surface as plain errors carrying an errno-style code.
  if (err instanceof Error && 'code' in err && typeof err.code === 'string' && CONNECTION_CODE.test(err.code)) {
    return new StorageError(`${context}: ${err.message}`, { cause: err });
  }
  return err;
}

export class PostgresIngestStore implements IngestStore {
  constructor(private readonly sql: Sql) {}

  async transaction<T>(fn: (tx: IngestTx) => Promise<T>): Promise<T> {
    try {
      // Boxed so postgres' array-unwrapping result type leaves T alone.
      const { value } = await this.sql.begin(async (tx) => ({ value: await fn(createTx(tx)) }));
      return value;
    } catch (err) {
      throw toStorageError(err, 'Transaction rolled back');
    }
  }

  findOverlappingRange(range: DateRange): Promise<ProcessedRange | null> {
    return this.transaction((tx) => tx.findOverlappingRange(range));
  }

  findRangeByToken(sourceToken: string): Promise<ProcessedRange | null> {
    return this.transaction((tx) => tx.findRangeByToken(sourceToken));
  }

  recordRange(sourceToken: string, range: DateRange): Promise<void> {
    return this.transaction((tx) => tx.recordRange(sourceToken, range));
  }

  async countRows(): Promise<TableCounts> {
    try {
      return await this.sql.begin((tx) => queries.countRows(tx));
    } catch (err) {
      throw toStorageError(err, 'Row count failed');
    }
  }

  async listProcessedRanges(): Promise<ProcessedRange[]> {
    try {
      const { ranges } = await this.sql.begin(async (tx) => ({ ranges: await queries.listProcessedRanges(tx) }));
      return ranges;
    } catch (err) {
      throw toStorageError(err, 'Listing processed ranges failed');
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
