import type { LedgerStore } from '../db/store.js';
import type { DateRange, ProcessedRange } from '../types/entities.js';
import { MalformedTokenWarning } from '../errors.js';
import { isIsoDate } from '../utils/date.js';

// prefix_<start>_<end>_<suffix>, e.g. mlb_raw_2024-04-01_2024-04-07_20240408_093015.json
const TOKEN_PATTERN = /^.+?_(\d{4}-\d{2}-\d{2})_(\d{4}-\d{2}-\d{2})_.+$/;

/**
 * Extract the declared date range from a unit's source token.
 * Throws MalformedTokenWarning when the token does not match, a date is not a
 * real calendar date, or start is after end.
 */
export function parseSourceToken(token: string): DateRange {
  const m = TOKEN_PATTERN.exec(token);
  const start = m?.[1];
  const end = m?.[2];
  if (!start || !end || !isIsoDate(start) || !isIsoDate(end) || start > end) {
    throw new MalformedTokenWarning(token);
  }
  return { start, end };
}

/** Inclusive ranges [s1,e1] and [s2,e2] overlap iff s1 <= e2 and s2 <= e1. */
export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  // YYYY-MM-DD compares correctly as a string.
  return a.start <= b.end && b.start <= a.end;
}

/**
 * Durable record of fully processed date ranges.
 * Any overlap with a recorded range rejects the whole candidate unit.
 */
export class IngestionLedger {
  constructor(private readonly store: LedgerStore) {}

  async overlaps(range: DateRange): Promise<boolean> {
    return (await this.store.findOverlappingRange(range)) !== null;
  }

  findOverlap(range: DateRange): Promise<ProcessedRange | null> {
    return this.store.findOverlappingRange(range);
  }

  async isRecorded(sourceToken: string): Promise<boolean> {
    return (await this.store.findRangeByToken(sourceToken)) !== null;
  }

  /** Commit marker for a unit. Only call once its loads have succeeded. */
  record(sourceToken: string, range: DateRange): Promise<void> {
    return this.store.recordRange(sourceToken, range);
  }
}
