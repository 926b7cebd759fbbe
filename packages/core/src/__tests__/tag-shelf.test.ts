import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../errors';
import { TagShelf } from '../tag-shelf';
import { makeConfig, makeTempDir, removeDir } from './helpers';

describe('TagShelf', () => {
  let dir: string;
  let filePath: string;
  let shelf: TagShelf;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = path.join(dir, 'tags.json');
    shelf = TagShelf.open({ filePath, config: makeConfig(), cwd: dir, exists: () => true });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('persists tags added through the facade', () => {
    expect(shelf.addTags('notes/todo.md', ['work', 'Urgent'])).toEqual(['work', 'Urgent']);

    const stored = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    expect(stored).toEqual({ [path.join(dir, 'notes/todo.md')]: ['work', 'Urgent'] });
  });

  it('searches exactly and fuzzily', () => {
    shelf.addTags('/a.py', ['python', 'backend']);
    shelf.addTags('/b.js', ['javascript']);

    expect(shelf.search(['PYTHON'])).toEqual(['/a.py']);
    expect(shelf.search(['pythn'])).toEqual([]);
    expect(shelf.search(['pythn'], true)).toEqual(['/a.py']);
  });

  it('sees changes written by another instance', () => {
    const other = TagShelf.open({ filePath, config: makeConfig(), cwd: dir });
    other.addTags('/x', ['shared']);

    expect(shelf.listTags()).toEqual(['shared']);
  });

  it('rejects invalid tags without writing', () => {
    expect(() => shelf.addTags('/a', ['ok', '  '])).toThrow(ValidationError);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it('removes tags and drops emptied records', () => {
    shelf.addTags('/a', ['x', 'y']);
    expect(shelf.removeTags('/a', ['x'])).toEqual(['y']);
    expect(shelf.removeTags('/a', ['y'])).toEqual([]);
    expect(shelf.listAll().size).toBe(0);
  });

  it('reports whether removePath found a record', () => {
    shelf.addTags('/a', ['x']);
    expect(shelf.removePath('/missing')).toBe(false);
    expect(shelf.removePath('/a')).toBe(true);
    expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual({});
  });

  it('summarizes the store', () => {
    shelf.addTags('/a', ['x', 'y']);
    shelf.addTags('/b', ['x', 'y']);
    expect(shelf.findDuplicates()).toEqual([{ tags: ['x', 'y'], paths: ['/a', '/b'] }]);
    expect(shelf.overallStats().totalTags).toBe(4);
    expect(shelf.fileCountDistribution().distributionSummary).toEqual({ 2: 2 });
  });

  it('restores a backup taken before a bulk operation', () => {
    shelf.addTags('/a', ['x']);
    shelf.addTags('/b', ['y']);
    shelf.removeByTag('x');

    const [backup] = shelf.listBackups();
    expect([...shelf.listAll().keys()]).toEqual(['/b']);

    expect(shelf.restoreBackup(backup.id)).toBe(2);
    expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual({ '/a': ['x'], '/b': ['y'] });
    expect(shelf.listBackups()).toHaveLength(2);
  });
});
