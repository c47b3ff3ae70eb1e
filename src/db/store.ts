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

/** Reads and writes against processed_ranges. */
export interface LedgerStore {
  /** First recorded range with start <= range.end and range.start <= end, or null. */
  findOverlappingRange(range: DateRange): Promise<ProcessedRange | null>;
  findRangeByToken(sourceToken: string): Promise<ProcessedRange | null>;
  recordRange(sourceToken: string, range: DateRange): Promise<void>;
}

/**
 * Writes that run inside one transaction.
 *
 * Each upsert is a single insert-on-conflict statement that returns the id of the
 * row keyed by externalId, whether it was just created or already there. Existing
 * rows are never modified. undefined means no row came back.
 */
export interface IngestTx extends LedgerStore {
  upsertTeam(team: TeamInput): Promise<number | undefined>;
  upsertPlayer(player: PlayerInput): Promise<number | undefined>;
  upsertGame(game: GameInput): Promise<number | undefined>;
  /** Bulk insert; rows colliding on (game, player) are ignored. Returns rows written. */
  insertBatterStats(rows: BatterStatRow[]): Promise<number>;
  insertPitcherStats(rows: PitcherStatRow[]): Promise<number>;
}

export interface IngestStore extends LedgerStore {
  /** Commits when fn resolves, rolls back every write made through tx when it throws. */
  transaction<T>(fn: (tx: IngestTx) => Promise<T>): Promise<T>;
  countRows(): Promise<TableCounts>;
  close(): Promise<void>;
}
