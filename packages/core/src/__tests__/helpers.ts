import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StaticConfigProvider } from '../config';
import type { ConfigValues, TagDocument } from '../contracts';
import { TagDatabase } from '../db';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tagshelf-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeConfig(overrides: Partial<ConfigValues> = {}): StaticConfigProvider {
  return new StaticConfigProvider(overrides);
}

export function writeDocument(filePath: string, doc: TagDocument): void {
  fs.writeFileSync(filePath, JSON.stringify(doc), 'utf8');
}

/**
 * Database loaded from `doc`, written to `<dir>/tags.json`.
 */
export function seedDatabase(dir: string, doc: TagDocument, overrides: Partial<ConfigValues> = {}): TagDatabase {
  const filePath = path.join(dir, 'tags.json');
  writeDocument(filePath, doc);
  return TagDatabase.open({ filePath, config: makeConfig(overrides), cwd: dir });
}
