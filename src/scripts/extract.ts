/**
 * Fetch one date window from the stats API and drop it into the intake directory.
 * Usage: npx tsx src/scripts/extract.ts <start-date> <end-date>   (YYYY-MM-DD)
 */
import { z } from 'zod';
import { StatsApiClient } from '../extract/stats-api.js';
import { extractSnapshot, writeSnapshot } from '../extract/extractor.js';
import { isIsoDate } from '../utils/date.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

const isoDate = z.string().refine(isIsoDate, 'expected a YYYY-MM-DD date');

const argsSchema = z
  .tuple([isoDate, isoDate])
  .refine(([start, end]) => start <= end, 'start date must not be after end date');

const parsed = argsSchema.safeParse(process.argv.slice(2, 4));
if (!parsed.success) {
  console.error(`Invalid arguments: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  console.error('Usage: npx tsx src/scripts/extract.ts <start-date> <end-date>');
  process.exit(1);
}

const [start, end] = parsed.data;
const range = { start, end };
const season = start.slice(0, 4);

const client = new StatsApiClient({
  baseUrl: config.STATS_API_BASE_URL,
  minDelayMs: config.STATS_API_RATE_LIMIT_MS,
});

try {
  const snapshot = await extractSnapshot(client, range, season);
  const filePath = writeSnapshot(config.INTAKE_DIR, range, snapshot);
  logger.info({ filePath }, 'Raw snapshot written');
} catch (err) {
  logger.fatal(err, 'Extraction failed');
  process.exit(1);
}
