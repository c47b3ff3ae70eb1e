import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { checksumOf, planMigrations, readMigrationFiles } from '../../migrations/runner.js';
import { makeWorkspace } from '../helpers/fixture-loader.js';

describe('readMigrationFiles', () => {
  it('should read only .sql files, in name order, with their checksums', () => {
    const { root } = makeWorkspace();
    fs.writeFileSync(path.join(root, '002_b.sql'), 'SELECT 2;');
    fs.writeFileSync(path.join(root, '001_a.sql'), 'SELECT 1;');
    fs.writeFileSync(path.join(root, 'notes.md'), 'not a migration');

    const files = readMigrationFiles(root);

    expect(files.map((f) => f.name)).toEqual(['001_a.sql', '002_b.sql']);
    expect(files[0]).toEqual({ name: '001_a.sql', content: 'SELECT 1;', checksum: checksumOf('SELECT 1;') });
  });

  it('should find the schema migration shipped with the project', () => {
    const dir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'migrations');
    expect(readMigrationFiles(dir).map((f) => f.name)).toContain('001_initial_schema.sql');
  });
});

describe('planMigrations', () => {
  const file = (name: string, content: string) => ({ name, content, checksum: checksumOf(content) });
  const files = [file('001_a.sql', 'SELECT 1;'), file('002_b.sql', 'SELECT 2;')];

  it('should leave files already applied unchanged out of the plan', () => {
    const plan = planMigrations(files, new Map([['001_a.sql', checksumOf('SELECT 1;')]]));

    expect(plan.pending.map((f) => f.name)).toEqual(['002_b.sql']);
    expect(plan.changed).toEqual([]);
  });

  it('should report an applied file whose content changed', () => {
    const plan = planMigrations(files, new Map([['001_a.sql', checksumOf('SELECT 0;')]]));

    expect(plan.changed).toEqual(['001_a.sql']);
    expect(plan.pending.map((f) => f.name)).toEqual(['002_b.sql']);
  });

  it('should plan every file on an empty database', () => {
    expect(planMigrations(files, new Map()).pending).toHaveLength(2);
  });
});
