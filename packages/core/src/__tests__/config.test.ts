import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, EnvConfigLoader, StaticConfigProvider, envVarName } from '../config';
import { ValidationError } from '../errors';
import { makeTempDir, removeDir } from './helpers';

describe('StaticConfigProvider', () => {
  it('falls back to defaults', () => {
    const config = new StaticConfigProvider();
    expect(config.get('search.fuzzy_threshold')).toBe(0.6);
    expect(config.get('tags.max_per_file')).toBe(50);
    expect(config.toJSON()).toEqual(DEFAULT_CONFIG);
  });

  it('applies overrides', () => {
    const config = new StaticConfigProvider({ 'search.case_sensitive': true, 'backup.count': 2 });
    expect(config.get('search.case_sensitive')).toBe(true);
    expect(config.get('backup.count')).toBe(2);
  });

  it('rejects out-of-range values and names the key', () => {
    expect(() => new StaticConfigProvider({ 'search.fuzzy_threshold': 1.5 })).toThrow(ValidationError);
    let caught: unknown;
    try {
      new StaticConfigProvider({ 'tags.max_per_file': 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError ? caught.key : undefined).toBe('tags.max_per_file');
  });
});

describe('EnvConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('maps keys to prefixed variable names', () => {
    expect(envVarName('search.fuzzy_threshold')).toBe('TAGSHELF_SEARCH_FUZZY_THRESHOLD');
    expect(envVarName('backup.on_bulk_operations')).toBe('TAGSHELF_BACKUP_ON_BULK_OPERATIONS');
  });

  it('reads values from the first existing .env file', () => {
    const envPath = path.join(dir, '.env');
    fs.writeFileSync(envPath, 'TAGSHELF_TAGS_MAX_PER_FILE=7\nTAGSHELF_SEARCH_CASE_SENSITIVE=yes\n');

    const config = new EnvConfigLoader({ envPaths: [path.join(dir, 'missing.env'), envPath], env: {} }).load();

    expect(config.get('tags.max_per_file')).toBe(7);
    expect(config.get('search.case_sensitive')).toBe(true);
    expect(config.get('backup.count')).toBe(5);
  });

  it('lets the environment override the file', () => {
    const envPath = path.join(dir, '.env');
    fs.writeFileSync(envPath, 'TAGSHELF_BACKUP_COUNT=3\n');

    const config = new EnvConfigLoader({
      envPaths: [envPath],
      env: { TAGSHELF_BACKUP_COUNT: '9', TAGSHELF_BACKUP_AUTO_BACKUP: 'off' },
    }).load();

    expect(config.get('backup.count')).toBe(9);
    expect(config.get('backup.auto_backup')).toBe(false);
  });

  it('rejects unparseable values', () => {
    const loader = new EnvConfigLoader({ env: { TAGSHELF_SEARCH_FUZZY_THRESHOLD: 'high' } });
    expect(() => loader.load()).toThrow(ValidationError);
  });

  it('rejects values outside the allowed range', () => {
    const loader = new EnvConfigLoader({ env: { TAGSHELF_FILTER_SIMILARITY_THRESHOLD: '2' } });
    expect(() => loader.load()).toThrow(/Invalid configuration/);
  });
});
