import postgres from 'postgres';
import { config } from '../config.js';

export const sql = postgres(config.DATABASE_URL, {
  max: 4,
  idle_timeout: 20,
  connect_timeout: 10,
  onnotice: () => {},
});
