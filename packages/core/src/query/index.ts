import { distance } from 'fastest-levenshtein';
import type { ConfigurationProvider } from '../config';
import type { TagDatabase } from '../db';
import { ValidationError } from '../errors';
import { TagSet, comparisonKey, normalizeTag, normalizeTags, type PathKey, type Tag } from '../tags';

export interface FuzzyMatch {
  path: PathKey;
  /** Lowest best-match score across the query tags. */
  score: number;
  /** Query tag -> closest stored tag and its similarity. */
  matches: Record<string, { tag: Tag; similarity: number }>;
}

export interface SearchOptions {
  fuzzy?: boolean;
  threshold?: number;
}

export function assertThreshold(threshold: number, key: string): void {
  if (typeof threshold !== 'number' || Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError(`Threshold must be between 0.0 and 1.0, got ${threshold}`, { key });
  }
}

/**
 * Normalized edit similarity in [0, 1]: 1 - levenshtein / longer length.
 */
export function tagNameSimilarity(a: string, b: string, caseSensitive: boolean): number {
  const s1 = comparisonKey(a, caseSensitive);
  const s2 = comparisonKey(b, caseSensitive);
  const maxLength = Math.max(s1.length, s2.length);
  if (maxLength === 0) return 1;
  return 1 - distance(s1, s2) / maxLength;
}

/**
 * Read-only lookups over a loaded TagDatabase.
 */
export class QueryEngine {
  private readonly db: TagDatabase;
  private readonly config: ConfigurationProvider;

  constructor(db: TagDatabase, config: ConfigurationProvider) {
    this.db = db;
    this.config = config;
  }

  private get caseSensitive(): boolean {
    return this.config.get('search.case_sensitive');
  }

  /**
   * Paths carrying every query tag. An empty query matches nothing.
   */
  searchExact(queryTags: readonly string[]): PathKey[] {
    const query = this.parseQuery(queryTags);
    if (query.length === 0) return [];

    const results: PathKey[] = [];
    for (const [path, tags] of this.db.tagSets()) {
      if (query.every((tag) => tags.has(tag))) {
        results.push(path);
      }
    }
    return results;
  }

  /**
   * Paths where every query tag has a stored tag at least `threshold` similar.
   */
  searchFuzzy(queryTags: readonly string[], threshold?: number): FuzzyMatch[] {
    const cutoff = threshold ?? this.config.get('search.fuzzy_threshold');
    assertThreshold(cutoff, 'search.fuzzy_threshold');

    const query = this.parseQuery(queryTags);
    if (query.length === 0) return [];

    const results: FuzzyMatch[] = [];
    for (const [path, tags] of this.db.entries()) {
      const matches: FuzzyMatch['matches'] = {};
      let score = 1;
      let matched = true;

      for (const queryTag of query) {
        let best: { tag: Tag; similarity: number } | undefined;
        for (const tag of tags) {
          const similarity = tagNameSimilarity(queryTag, tag, this.caseSensitive);
          if (!best || similarity > best.similarity) {
            best = { tag, similarity };
          }
        }
        if (!best || best.similarity < cutoff) {
          matched = false;
          break;
        }
        matches[queryTag] = best;
        score = Math.min(score, best.similarity);
      }

      if (matched) {
        results.push({ path, score, matches });
      }
    }
    return results;
  }

  search(queryTags: readonly string[], options: SearchOptions = {}): PathKey[] {
    if (options.fuzzy) {
      return this.searchFuzzy(queryTags, options.threshold).map((match) => match.path);
    }
    return this.searchExact(queryTags);
  }

  /** Copy of every record; mutating it does not affect the database. */
  listAll(): Map<PathKey, Tag[]> {
    return new Map(this.db.entries());
  }

  /** Distinct tags across all records, sorted. */
  listTags(): Tag[] {
    const all = new TagSet(this.caseSensitive);
    for (const [, tags] of this.db.entries()) {
      for (const tag of tags) {
        all.add(tag);
      }
    }
    return all.values().sort((a, b) => a.localeCompare(b));
  }

  tagsForPath(path: string): Tag[] {
    return this.db.getTags(path) ?? [];
  }

  filesByTag(tag: string): PathKey[] {
    const parsed = normalizeTag(tag);
    if (!parsed.success) throw parsed.error;
    return this.searchExact([parsed.value]);
  }

  /**
   * Distinct stored tags containing `fragment`, ignoring case.
   */
  searchTags(fragment: string): Tag[] {
    const needle = fragment.trim().toLowerCase();
    if (needle.length === 0) return [];
    return this.listTags().filter((tag) => tag.toLowerCase().includes(needle));
  }

  private parseQuery(queryTags: readonly string[]): Tag[] {
    const parsed = normalizeTags(queryTags);
    if (!parsed.success) throw parsed.error;
    return new TagSet(this.caseSensitive, parsed.value).values();
  }
}
