import * as path from 'path';
import { BulkCoordinator, type BulkResult } from './bulk';
import type { ConfigurationProvider } from './config';
import type { BackupInfo, BulkOptions, TagOperation } from './contracts';
import { BackupManager, TagDatabase } from './db';
import { FilterEngine, type DuplicateGroup, type SimilarGroup } from './filter';
import { QueryEngine } from './query';
import { StatsEngine, type FileCountDistribution, type OverallStats } from './stats';
import type { PathKey, Tag } from './tags';

export interface TagShelfOptions {
  filePath: string;
  config: ConfigurationProvider;
  /** Defaults to a `backups` directory beside the tag file. */
  backupDir?: string;
  cwd?: string;
  exists?: (path: string) => boolean;
}

/**
 * Entry point for a CLI or UI layer. Every call reloads the tag file,
 * and every write persists before returning.
 */
export class TagShelf {
  readonly db: TagDatabase;
  readonly backups: BackupManager;
  private readonly config: ConfigurationProvider;
  private readonly query: QueryEngine;
  private readonly filter: FilterEngine;
  private readonly stats: StatsEngine;
  private readonly bulk: BulkCoordinator;

  constructor(options: TagShelfOptions) {
    this.config = options.config;
    this.db = new TagDatabase({ filePath: options.filePath, config: options.config, cwd: options.cwd });
    this.backups = new BackupManager({
      backupDir: options.backupDir ?? path.join(path.dirname(options.filePath), 'backups'),
      keep: options.config.get('backup.count'),
    });
    this.query = new QueryEngine(this.db, options.config);
    this.filter = new FilterEngine(this.db, options.config, options.exists);
    this.stats = new StatsEngine(this.db);
    this.bulk = new BulkCoordinator({
      db: this.db,
      config: options.config,
      backups: this.backups,
      exists: options.exists,
    });
  }

  static open(options: TagShelfOptions): TagShelf {
    const shelf = new TagShelf(options);
    shelf.db.load();
    return shelf;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  search(tags: readonly string[], fuzzy = false, threshold?: number): PathKey[] {
    this.db.load();
    return this.query.search(tags, { fuzzy, threshold });
  }

  listAll(): Map<PathKey, Tag[]> {
    this.db.load();
    return this.query.listAll();
  }

  listTags(): Tag[] {
    this.db.load();
    return this.query.listTags();
  }

  findDuplicates(): DuplicateGroup[] {
    this.db.load();
    return this.filter.findDuplicates();
  }

  findOrphans(): PathKey[] {
    this.db.load();
    return this.filter.findOrphans();
  }

  findSimilar(threshold?: number): SimilarGroup[] {
    this.db.load();
    return this.filter.findSimilar(threshold);
  }

  overallStats(): OverallStats {
    this.db.load();
    return this.stats.overall();
  }

  fileCountDistribution(): FileCountDistribution {
    this.db.load();
    return this.stats.fileCountDistribution();
  }

  // ============================================================================
  // Writes
  // ============================================================================

  addTags(filePath: string, tags: readonly string[]): Tag[] {
    this.db.load();
    const result = this.db.addTags(filePath, tags);
    if (!result.success) throw result.error;
    this.db.save();
    return result.value;
  }

  removeTags(filePath: string, tags: readonly string[]): Tag[] {
    this.db.load();
    const result = this.db.removeTags(filePath, tags);
    if (!result.success) throw result.error;
    this.db.save();
    return result.value;
  }

  removePath(filePath: string): boolean {
    this.db.load();
    const removed = this.db.removePath(filePath);
    if (removed) {
      this.db.save();
    }
    return removed;
  }

  bulkApply(paths: readonly string[], operation: TagOperation, options?: BulkOptions): BulkResult {
    return this.bulk.bulkApply(paths, operation, options);
  }

  retag(oldTag: string, newTag: string, options?: BulkOptions): BulkResult {
    return this.bulk.retag(oldTag, newTag, options);
  }

  removeByTag(tag: string, options?: BulkOptions): BulkResult {
    return this.bulk.removeByTag(tag, options);
  }

  removeTagEverywhere(tag: string, options?: BulkOptions): BulkResult {
    return this.bulk.removeTagEverywhere(tag, options);
  }

  cleanOrphans(options?: BulkOptions): BulkResult {
    return this.bulk.cleanOrphans(options);
  }

  // ============================================================================
  // Backups
  // ============================================================================

  listBackups(): BackupInfo[] {
    return this.backups.list();
  }

  /**
   * Replaces the store with a backup's contents. The current state is
   * backed up first when backups are enabled.
   */
  restoreBackup(id: string): number {
    const document = this.backups.read(id);
    this.db.load();
    if (this.config.get('backup.auto_backup')) {
      this.backups.create(this.db.toDocument());
    }

    const restored = new TagDatabase({ filePath: this.db.filePath, config: this.config });
    for (const [filePath, tags] of Object.entries(document)) {
      const result = restored.addTags(filePath, tags);
      if (!result.success) throw result.error;
    }
    restored.save();
    this.db.adopt(restored);
    return restored.size;
  }
}
