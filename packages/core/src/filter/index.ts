import * as fs from 'fs';
import type { ConfigurationProvider } from '../config';
import type { TagDatabase } from '../db';
import { PathNotFoundError, ValidationError } from '../errors';
import { assertThreshold } from '../query';
import { TagSet, type PathKey, type Tag } from '../tags';

export interface DuplicateGroup {
  tags: Tag[];
  paths: PathKey[];
}

export interface SimilarGroup {
  paths: PathKey[];
}

export interface SimilarFile {
  path: PathKey;
  tags: Tag[];
  similarity: number;
  commonTags: Tag[];
}

export interface TagCluster {
  tag: Tag;
  paths: PathKey[];
  /** Share of all records carrying the tag, 0-100. */
  percentage: number;
}

export interface IsolatedFile {
  path: PathKey;
  tags: Tag[];
  /** Largest number of tags shared with any other record. */
  maxSharedTags: number;
}

/**
 * Jaccard index of two tag sets: |A ∩ B| / |A ∪ B|.
 * Two empty sets are identical (1); one empty set shares nothing (0).
 */
export function tagSimilarity(a: TagSet, b: TagSet): number {
  if (a.size === 0 && b.size === 0) return 1;
  if (a.size === 0 || b.size === 0) return 0;

  const keysA = a.keys();
  let intersection = 0;
  for (const key of b.keys()) {
    if (keysA.has(key)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

function sharedCount(a: TagSet, b: TagSet): number {
  const keysA = a.keys();
  let n = 0;
  for (const key of b.keys()) {
    if (keysA.has(key)) n++;
  }
  return n;
}

/**
 * Union-find over record indices; path compression keeps lookups flat.
 */
class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    // Lower index stays root so groups keep database order.
    if (ra < rb) this.parent[rb] = ra;
    else if (rb < ra) this.parent[ra] = rb;
  }
}

/**
 * Analytical passes over a loaded TagDatabase.
 */
export class FilterEngine {
  private readonly db: TagDatabase;
  private readonly config: ConfigurationProvider;
  private readonly exists: (path: string) => boolean;

  constructor(db: TagDatabase, config: ConfigurationProvider, exists: (path: string) => boolean = fs.existsSync) {
    this.db = db;
    this.config = config;
    this.exists = exists;
  }

  /**
   * Groups of two or more paths with equal tag sets, ignoring order.
   */
  findDuplicates(): DuplicateGroup[] {
    const groups = new Map<string, DuplicateGroup>();

    for (const [path, tags] of this.db.tagSets()) {
      const key = tags.equalityKey();
      const group = groups.get(key);
      if (group) {
        group.paths.push(path);
      } else {
        groups.set(key, { tags: tags.values(), paths: [path] });
      }
    }

    return [...groups.values()].filter((group) => group.paths.length >= 2);
  }

  /**
   * Paths whose filesystem entry is gone right now. The answer can be stale
   * by the time the caller acts on it.
   */
  findOrphans(): PathKey[] {
    return this.db.paths().filter((path) => !this.exists(path));
  }

  verifyPath(path: string): PathKey {
    const key = this.db.resolvePath(path);
    if (!key.success) throw key.error;
    if (!this.exists(key.value)) {
      throw new PathNotFoundError(key.value);
    }
    return key.value;
  }

  /**
   * Transitively closed groups of records whose pairwise Jaccard
   * similarity reaches `threshold`.
   */
  findSimilar(threshold: number = this.config.get('filter.similarity_threshold')): SimilarGroup[] {
    assertThreshold(threshold, 'filter.similarity_threshold');

    const records = [...this.db.tagSets()];
    const sets = new DisjointSet(records.length);

    for (let i = 0; i < records.length; i++) {
      for (let j = i + 1; j < records.length; j++) {
        if (tagSimilarity(records[i][1], records[j][1]) >= threshold) {
          sets.union(i, j);
        }
      }
    }

    const groups = new Map<number, PathKey[]>();
    records.forEach(([path], i) => {
      const root = sets.find(i);
      const members = groups.get(root);
      if (members) members.push(path);
      else groups.set(root, [path]);
    });

    return [...groups.values()].filter((paths) => paths.length >= 2).map((paths) => ({ paths }));
  }

  /**
   * Records similar to one tracked path, most similar first.
   */
  findSimilarTo(path: string, threshold: number = this.config.get('filter.similarity_threshold')): SimilarFile[] {
    assertThreshold(threshold, 'filter.similarity_threshold');

    const key = this.db.resolvePath(path);
    if (!key.success) throw key.error;
    const targetTags = this.db.getTags(key.value);
    if (!targetTags) {
      throw new ValidationError(`Not a tagged path: ${key.value}`, { path: key.value });
    }
    const target = new TagSet(this.db.caseSensitive, targetTags);

    const results: SimilarFile[] = [];
    for (const [other, tags] of this.db.tagSets()) {
      if (other === key.value) continue;
      const similarity = tagSimilarity(target, tags);
      if (similarity >= threshold) {
        results.push({
          path: other,
          tags: tags.values(),
          similarity,
          commonTags: tags.values().filter((tag) => target.has(tag)),
        });
      }
    }
    return results.sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Tags shared by at least `minSize` records, largest cluster first.
   */
  findClusters(minSize = 2): TagCluster[] {
    const byTag = new Map<string, { tag: Tag; paths: PathKey[] }>();
    const probe = new TagSet(this.db.caseSensitive);

    for (const [path, tags] of this.db.entries()) {
      for (const tag of tags) {
        probe.add(tag);
        const canonical = probe.get(tag) ?? tag;
        const entry = byTag.get(canonical);
        if (entry) entry.paths.push(path);
        else byTag.set(canonical, { tag: canonical, paths: [path] });
      }
    }

    const total = this.db.size;
    return [...byTag.values()]
      .filter((entry) => entry.paths.length >= minSize)
      .map((entry) => ({ ...entry, percentage: total === 0 ? 0 : (entry.paths.length / total) * 100 }))
      .sort((a, b) => b.paths.length - a.paths.length || a.tag.localeCompare(b.tag));
  }

  /**
   * Records sharing at most `maxShared` tags with every other record.
   */
  findIsolated(maxShared = 1): IsolatedFile[] {
    const records = [...this.db.tagSets()];
    const results: IsolatedFile[] = [];

    for (const [path, tags] of records) {
      let maxSharedTags = 0;
      for (const [other, otherTags] of records) {
        if (other === path) continue;
        maxSharedTags = Math.max(maxSharedTags, sharedCount(tags, otherTags));
        if (maxSharedTags > maxShared) break;
      }
      if (maxSharedTags <= maxShared) {
        results.push({ path, tags: tags.values(), maxSharedTags });
      }
    }
    return results;
  }
}
