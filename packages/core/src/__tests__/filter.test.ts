import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ConfigValues, TagDocument } from '../contracts';
import { PathNotFoundError, ValidationError } from '../errors';
import { FilterEngine, tagSimilarity } from '../filter';
import { TagSet, normalizeTags } from '../tags';
import { makeConfig, makeTempDir, removeDir, seedDatabase } from './helpers';

function set(tags: string[], caseSensitive = false): TagSet {
  const parsed = normalizeTags(tags);
  if (!parsed.success) throw parsed.error;
  return new TagSet(caseSensitive, parsed.value);
}

describe('FilterEngine', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  function engine(doc: TagDocument, overrides: Partial<ConfigValues> = {}): FilterEngine {
    return new FilterEngine(seedDatabase(dir, doc, overrides), makeConfig(overrides));
  }

  describe('findDuplicates', () => {
    it('groups paths with the same tags in any order', () => {
      const groups = engine({ '/a': ['x', 'y'], '/b': ['y', 'x'], '/c': ['z'] }).findDuplicates();
      expect(groups).toEqual([{ tags: ['x', 'y'], paths: ['/a', '/b'] }]);
    });

    it('returns nothing when every tag set is unique', () => {
      expect(engine({ '/a': ['x'], '/b': ['y'] }).findDuplicates()).toEqual([]);
    });

    it('compares tags under the case policy', () => {
      expect(engine({ '/a': ['X'], '/b': ['x'] }).findDuplicates()).toEqual([{ tags: ['X'], paths: ['/a', '/b'] }]);
      expect(engine({ '/a': ['X'], '/b': ['x'] }, { 'search.case_sensitive': true }).findDuplicates()).toEqual([]);
    });
  });

  describe('findOrphans', () => {
    it('reports paths missing from the filesystem', () => {
      const present = path.join(dir, 'present.txt');
      const gone = path.join(dir, 'gone.txt');
      fs.writeFileSync(present, 'data');

      const orphans = engine({ [present]: ['t'], [gone]: ['t'] }).findOrphans();
      expect(orphans).toEqual([gone]);
    });

    it('checks the filesystem on every call', () => {
      const file = path.join(dir, 'later.txt');
      const filter = engine({ [file]: ['t'] });
      expect(filter.findOrphans()).toEqual([file]);

      fs.writeFileSync(file, 'data');
      expect(filter.findOrphans()).toEqual([]);
    });

    it('verifies a single path on request', () => {
      const present = path.join(dir, 'present.txt');
      fs.writeFileSync(present, 'data');
      const filter = engine({});

      expect(filter.verifyPath(present)).toBe(present);
      expect(() => filter.verifyPath(path.join(dir, 'missing.txt'))).toThrow(PathNotFoundError);
    });
  });

  describe('tagSimilarity', () => {
    it('is the Jaccard index of the two sets', () => {
      expect(tagSimilarity(set(['python', 'backend', 'api']), set(['python', 'backend', 'api']))).toBe(1);
      expect(tagSimilarity(set(['python', 'backend']), set(['javascript', 'frontend']))).toBe(0);
      expect(tagSimilarity(set(['python', 'backend', 'api']), set(['python', 'frontend', 'web']))).toBeCloseTo(0.2);
    });

    it('ignores case when comparison is case-insensitive', () => {
      expect(tagSimilarity(set(['Python', 'Backend']), set(['python', 'backend', 'api']))).toBeCloseTo(2 / 3);
    });

    it('handles empty sets', () => {
      expect(tagSimilarity(set([]), set([]))).toBe(1);
      expect(tagSimilarity(set(['python']), set([]))).toBe(0);
    });
  });

  describe('findSimilar', () => {
    const chain = {
      '/a': ['p', 'q', 'r'],
      '/b': ['q', 'r', 's'],
      '/c': ['r', 's', 't'],
      '/d': ['u'],
    };

    it('groups by transitive closure', () => {
      // a~b and b~c at 0.5, a~c only 0.2
      expect(engine(chain).findSimilar(0.5)).toEqual([{ paths: ['/a', '/b', '/c'] }]);
    });

    it('uses the configured threshold by default', () => {
      expect(engine(chain, { 'filter.similarity_threshold': 0.6 }).findSimilar()).toEqual([]);
    });

    it('groups only identical sets at threshold 1', () => {
      const groups = engine({ '/a': ['x', 'y'], '/b': ['x', 'y'], '/c': ['x'] }).findSimilar(1);
      expect(groups).toEqual([{ paths: ['/a', '/b'] }]);
    });

    it('rejects thresholds outside [0, 1]', () => {
      expect(() => engine(chain).findSimilar(2)).toThrow(ValidationError);
    });
  });

  describe('findSimilarTo', () => {
    const doc = {
      '/f1.py': ['python', 'backend', 'api'],
      '/f2.py': ['python', 'backend', 'api'],
      '/f4.py': ['python', 'frontend', 'web'],
      '/f8.py': ['python', 'backend'],
    };

    it('lists similar records, most similar first', () => {
      const results = engine(doc).findSimilarTo('/f1.py', 0.3);
      expect(results.map((r) => r.path)).toEqual(['/f2.py', '/f8.py']);
      expect(results[0].similarity).toBe(1);
      expect(results[1].similarity).toBeCloseTo(2 / 3);
      expect(results[1].commonTags).toEqual(['python', 'backend']);
    });

    it('rejects an untracked target', () => {
      expect(() => engine(doc).findSimilarTo('/nope.py')).toThrow(ValidationError);
    });
  });

  describe('findClusters', () => {
    it('lists tags shared by enough records, largest first', () => {
      const clusters = engine({
        '/a': ['python', 'api'],
        '/b': ['python'],
        '/c': ['api', 'python'],
        '/d': ['css'],
      }).findClusters(2);

      expect(clusters).toEqual([
        { tag: 'python', paths: ['/a', '/b', '/c'], percentage: 75 },
        { tag: 'api', paths: ['/a', '/c'], percentage: 50 },
      ]);
    });

    it('returns nothing when the minimum is above any cluster', () => {
      expect(engine({ '/a': ['x'], '/b': ['x'] }).findClusters(10)).toEqual([]);
    });
  });

  describe('findIsolated', () => {
    it('reports records sharing few tags with any other', () => {
      const isolated = engine({
        '/f1.py': ['python', 'common'],
        '/f2.py': ['python', 'common'],
        '/f3.js': ['javascript', 'unique'],
        '/f4.css': ['css', 'styling'],
      }).findIsolated(1);

      expect(isolated.map((f) => f.path)).toEqual(['/f3.js', '/f4.css']);
      expect(isolated.every((f) => f.maxSharedTags === 0)).toBe(true);
    });

    it('counts shared tags under the case policy', () => {
      expect(engine({ '/f1.py': ['Python', 'Backend'], '/f2.js': ['python', 'frontend'] }).findIsolated(0)).toEqual([]);
    });
  });
});
