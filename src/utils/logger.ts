import pino from 'pino';
import { config } from '../config.js';

export type { Logger } from 'pino';

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: 'mlb-ingest' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
