import * as path from 'path';
import { STATS_TOP_TAGS_LIMIT } from '../config';
import type { TagDatabase } from '../db';
import { comparisonKey, normalizeTag, type PathKey, type Tag } from '../tags';

export interface TagCount {
  tag: Tag;
  count: number;
}

export interface OverallStats {
  totalFiles: number;
  totalTags: number;
  uniqueTags: number;
  avgTagsPerFile: number;
  mostCommonTags: TagCount[];
  leastCommonTags: TagCount[];
  /** Number of tags on a record -> records with that many. */
  tagDistribution: Record<number, number>;
}

export interface TagStats {
  tag: string;
  filesWithTag: number;
  percentageOfFiles: number;
  files: PathKey[];
  coOccurringTags: TagCount[];
  /** Extension without dot -> count; `no_extension` for none. */
  fileTypes: Record<string, number>;
}

export interface FileCountDistribution {
  uniqueTags: number;
  /** Every tag, by number of records carrying it. */
  tagsByFileCount: TagCount[];
  /** Records carrying a tag -> tags with that many records. */
  distributionSummary: Record<number, number>;
}

function byCountDesc(a: TagCount, b: TagCount): number {
  return b.count - a.count || a.tag.localeCompare(b.tag);
}

/**
 * Usage statistics over a loaded TagDatabase.
 */
export class StatsEngine {
  private readonly db: TagDatabase;

  constructor(db: TagDatabase) {
    this.db = db;
  }

  overall(): OverallStats {
    const counts = this.countTags();
    const distribution: Record<number, number> = {};
    let totalTags = 0;

    for (const [, tags] of this.db.entries()) {
      totalTags += tags.length;
      distribution[tags.length] = (distribution[tags.length] ?? 0) + 1;
    }

    const ranked = [...counts.values()];
    const mostCommon = [...ranked].sort(byCountDesc).slice(0, STATS_TOP_TAGS_LIMIT);
    const leastCommon = [...ranked]
      .sort((a, b) => a.count - b.count || a.tag.localeCompare(b.tag))
      .slice(0, STATS_TOP_TAGS_LIMIT);

    const totalFiles = this.db.size;
    return {
      totalFiles,
      totalTags,
      uniqueTags: counts.size,
      avgTagsPerFile: totalFiles === 0 ? 0 : totalTags / totalFiles,
      mostCommonTags: mostCommon,
      leastCommonTags: leastCommon,
      tagDistribution: distribution,
    };
  }

  forTag(tag: string): TagStats {
    const parsed = normalizeTag(tag);
    const empty: TagStats = {
      tag,
      filesWithTag: 0,
      percentageOfFiles: 0,
      files: [],
      coOccurringTags: [],
      fileTypes: {},
    };
    if (!parsed.success) return empty;

    const key = comparisonKey(parsed.value, this.db.caseSensitive);
    const files: PathKey[] = [];
    const coOccurring = new Map<string, TagCount>();
    const fileTypes: Record<string, number> = {};

    for (const [file, tags] of this.db.tagSets()) {
      if (!tags.has(parsed.value)) continue;
      files.push(file);

      const ext = path.extname(file).slice(1).toLowerCase() || 'no_extension';
      fileTypes[ext] = (fileTypes[ext] ?? 0) + 1;

      for (const other of tags) {
        const otherKey = comparisonKey(other, this.db.caseSensitive);
        if (otherKey === key) continue;
        const entry = coOccurring.get(otherKey);
        if (entry) entry.count++;
        else coOccurring.set(otherKey, { tag: other, count: 1 });
      }
    }

    if (files.length === 0) return empty;
    return {
      tag: parsed.value,
      filesWithTag: files.length,
      percentageOfFiles: (files.length / this.db.size) * 100,
      files,
      coOccurringTags: [...coOccurring.values()].sort(byCountDesc),
      fileTypes,
    };
  }

  fileCountDistribution(): FileCountDistribution {
    const ranked = [...this.countTags().values()].sort(byCountDesc);
    const summary: Record<number, number> = {};
    for (const { count } of ranked) {
      summary[count] = (summary[count] ?? 0) + 1;
    }
    return { uniqueTags: ranked.length, tagsByFileCount: ranked, distributionSummary: summary };
  }

  private countTags(): Map<string, TagCount> {
    const counts = new Map<string, TagCount>();

    for (const [, tags] of this.db.entries()) {
      for (const tag of tags) {
        const key = comparisonKey(tag, this.db.caseSensitive);
        const entry = counts.get(key);
        if (entry) entry.count++;
        else counts.set(key, { tag, count: 1 });
      }
    }
    return counts;
  }
}
