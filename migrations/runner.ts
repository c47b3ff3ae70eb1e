import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Sql } from 'postgres';
import { logger as rootLogger, type Logger } from '../src/utils/logger.js';

const MIGRATIONS_DIR = path.dirname(fileURLToPath(import.meta.url));

export interface MigrationFile {
  name: string;
  content: string;
  checksum: string;
}

export interface MigrationPlan {
  pending: MigrationFile[];
  /** Applied migrations whose file no longer matches the recorded checksum. */
  changed: string[];
}

export function checksumOf(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/** Every *.sql file in the directory, in name order. */
export function readMigrationFiles(dir: string): MigrationFile[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => {
      const content = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, content, checksum: checksumOf(content) };
    });
}

/** Split files into those still to apply and applied ones edited since. */
export function planMigrations(files: MigrationFile[], applied: Map<string, string>): MigrationPlan {
  const pending: MigrationFile[] = [];
  const changed: string[] = [];
  for (const file of files) {
    const recorded = applied.get(file.name);
    if (recorded === undefined) pending.push(file);
    else if (recorded !== file.checksum) changed.push(file.name);
  }
  return { pending, changed };
}

/**
 * Apply every pending migration, each in its own transaction, and return their names.
 * Refuses to run when an already-applied file has been edited.
 */
export async function runMigrations(
  sql: Sql,
  dir: string = MIGRATIONS_DIR,
  log: Logger = rootLogger,
): Promise<string[]> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;

  const rows = await sql<{ name: string; checksum: string }[]>`SELECT name, checksum FROM _migrations ORDER BY id`;
  const plan = planMigrations(readMigrationFiles(dir), new Map(rows.map((r) => [r.name, r.checksum])));

  if (plan.changed.length > 0) {
    throw new Error(`Applied migrations changed on disk: ${plan.changed.join(', ')}`);
  }

  for (const file of plan.pending) {
    log.info({ migration: file.name }, 'Applying migration');
    await sql.begin(async (tx) => {
      await tx.unsafe(file.content);
      await tx`INSERT INTO _migrations (name, checksum) VALUES (${file.name}, ${file.checksum})`;
    });
  }

  log.info({ applied: plan.pending.length }, 'Migrations up to date');
  return plan.pending.map((f) => f.name);
}
