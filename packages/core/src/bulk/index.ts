import * as fs from 'fs';
import type { ConfigurationProvider } from '../config';
import {
  BulkOptionsSchema,
  TagOperationSchema,
  type BackupInfo,
  type BulkOptions,
  type TagOperation,
} from '../contracts';
import type { BackupManager, TagDatabase } from '../db';
import { BulkOperationError, ValidationError, ok, type BulkFailure, type Result } from '../errors';
import { comparisonKey, normalizeTag, type PathKey, type Tag } from '../tags';

export interface BulkResult {
  operation: string;
  /** Number of targets the batch visited. */
  processed: number;
  /** Targets whose stored tags differ after the batch. */
  changed: PathKey[];
  dryRun: boolean;
  backup: BackupInfo | null;
}

export interface BulkCoordinatorOptions {
  db: TagDatabase;
  config: ConfigurationProvider;
  backups: BackupManager;
  exists?: (path: string) => boolean;
}

type Mutation = (working: TagDatabase, target: string) => Result<unknown>;

function parseTag(raw: string): Tag {
  const parsed = normalizeTag(raw);
  if (!parsed.success) throw parsed.error;
  return parsed.value;
}

function sameTags(a: Tag[] | undefined, b: Tag[] | undefined): boolean {
  return JSON.stringify(a ?? []) === JSON.stringify(b ?? []);
}

/**
 * Applies one mutation to many paths as a single unit.
 *
 * Every batch runs the same protocol: reload the store, back it up when
 * configured, apply to a working copy, and persist only if every target
 * passed validation. A failed batch throws BulkOperationError listing each
 * failing target and leaves both the file and the in-memory database as
 * they were.
 */
export class BulkCoordinator {
  private readonly db: TagDatabase;
  private readonly config: ConfigurationProvider;
  private readonly backups: BackupManager;
  private readonly exists: (path: string) => boolean;

  constructor(options: BulkCoordinatorOptions) {
    this.db = options.db;
    this.config = options.config;
    this.backups = options.backups;
    this.exists = options.exists ?? fs.existsSync;
  }

  bulkApply(paths: readonly string[], operation: TagOperation, options?: BulkOptions): BulkResult {
    const parsed = TagOperationSchema.safeParse(operation);
    if (!parsed.success) {
      throw new ValidationError(`Invalid bulk operation: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    if (paths.length === 0) {
      throw new ValidationError('Bulk operation needs at least one target path');
    }

    const op = parsed.data;
    const mutate: Mutation = (working, target) => {
      switch (op.kind) {
        case 'add':
          return working.addTags(target, op.tags);
        case 'remove':
          return working.removeTags(target, op.tags);
        case 'replace':
          return working.replaceTags(target, op.tags);
      }
    };

    this.db.load();
    return this.runBatch(op.kind, [...paths], mutate, options);
  }

  /**
   * Renames `oldTag` to `newTag` on every record carrying it.
   */
  retag(oldTag: string, newTag: string, options?: BulkOptions): BulkResult {
    const from = parseTag(oldTag);
    const to = parseTag(newTag);
    const caseSensitive = this.config.get('search.case_sensitive');
    const fromKey = comparisonKey(from, caseSensitive);

    this.db.load();
    const targets = this.pathsWithTag(from);
    return this.runBatch(
      'retag',
      targets,
      (working, target) => {
        const tags = working.getTags(target) ?? [];
        const renamed = tags.map((tag) => (comparisonKey(tag, caseSensitive) === fromKey ? to : tag));
        return working.replaceTags(target, renamed);
      },
      options
    );
  }

  /** Deletes every record carrying `tag`. */
  removeByTag(tag: string, options?: BulkOptions): BulkResult {
    const target = parseTag(tag);
    this.db.load();
    return this.runBatch('remove-by-tag', this.pathsWithTag(target), (working, path) => ok(working.removePath(path)), options);
  }

  /** Removes `tag` from every record; emptied records are deleted. */
  removeTagEverywhere(tag: string, options?: BulkOptions): BulkResult {
    const target = parseTag(tag);
    this.db.load();
    return this.runBatch('remove-tag', this.pathsWithTag(target), (working, path) => working.removeTags(path, [target]), options);
  }

  /** Deletes records whose paths no longer exist on disk. */
  cleanOrphans(options?: BulkOptions): BulkResult {
    this.db.load();
    const orphans = this.db.paths().filter((path) => !this.exists(path));
    return this.runBatch('clean-orphans', orphans, (working, path) => ok(working.removePath(path)), options);
  }

  private pathsWithTag(tag: Tag): PathKey[] {
    const out: PathKey[] = [];
    for (const [path, tags] of this.db.tagSets()) {
      if (tags.has(tag)) out.push(path);
    }
    return out;
  }

  private backupEnabled(): boolean {
    return this.config.get('backup.auto_backup') && this.config.get('backup.on_bulk_operations');
  }

  /**
   * Expects `this.db` freshly loaded.
   */
  private runBatch(operation: string, targets: string[], mutate: Mutation, options?: BulkOptions): BulkResult {
    const { dryRun } = BulkOptionsSchema.parse(options ?? {});

    if (targets.length === 0) {
      return { operation, processed: 0, changed: [], dryRun, backup: null };
    }

    const backup = !dryRun && this.backupEnabled() ? this.backups.create(this.db.toDocument()) : null;

    const working = this.db.clone();
    const failures: BulkFailure[] = [];
    const changed: PathKey[] = [];

    for (const target of targets) {
      const result = mutate(working, target);
      if (!result.success) {
        failures.push({ path: target, error: result.error });
        continue;
      }
      const key = working.resolvePath(target);
      if (key.success && !sameTags(this.db.getTags(key.value), working.getTags(key.value)) && !changed.includes(key.value)) {
        changed.push(key.value);
      }
    }

    if (failures.length > 0) {
      console.warn(`[Bulk] ${operation} aborted, ${failures.length}/${targets.length} target(s) failed`);
      throw new BulkOperationError(operation, failures);
    }

    if (!dryRun) {
      working.save();
      this.db.adopt(working);
      console.log(`[Bulk] ${operation}: ${changed.length}/${targets.length} record(s) changed`);
    }

    return { operation, processed: targets.length, changed, dryRun, backup };
  }
}
