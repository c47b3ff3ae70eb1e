import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const FIXTURES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function loadFixture(source: string, filename: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, source, filename), 'utf-8');
}

/** Fresh intake and archive directories under the OS temp dir. */
export function makeWorkspace(): { root: string; intakeDir: string; archiveDir: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'mlb-ingest-'));
  const intakeDir = path.join(root, 'raw');
  const archiveDir = path.join(root, 'historical');
  fs.mkdirSync(intakeDir);
  return { root, intakeDir, archiveDir };
}

/** Drop a snapshot fixture into an intake directory under the given source token. */
export function stageUnit(intakeDir: string, token: string, fixture: string): string {
  const filePath = path.join(intakeDir, token);
  fs.writeFileSync(filePath, loadFixture('snapshots', fixture));
  return filePath;
}
