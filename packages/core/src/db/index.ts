import type { ConfigurationProvider } from '../config';
import { TagDocumentSchema, type TagDocument } from '../contracts';
import { StorageError, ValidationError, fail, ok, type Result } from '../errors';
import { TagSet, normalizeTag, normalizeTags, toPathKey, type PathKey, type Tag } from '../tags';
import { readJsonFile, writeFileAtomic } from './fs-utils';

export interface TagDatabaseOptions {
  /** Backing JSON file. */
  filePath: string;
  config: ConfigurationProvider;
  /** Base for resolving relative paths. Defaults to process.cwd(). */
  cwd?: string;
}

export interface RecordIssue {
  path: PathKey;
  error: ValidationError;
}

function atPath(error: ValidationError, path: string): ValidationError {
  return new ValidationError(`${path}: ${error.message}`, {
    path,
    tag: error.tag,
    key: error.key,
    issues: error.issues,
  });
}

/**
 * In-memory path -> tag set mapping backed by a single JSON document.
 *
 * Lifecycle: load() at the start of an operation, mutate, save() at the end.
 * Mutations validate before touching state and report rejection as a Result,
 * so a failed addTags/removeTags/replaceTags leaves the record as it was.
 */
export class TagDatabase {
  readonly filePath: string;
  private readonly config: ConfigurationProvider;
  private readonly cwd: string;
  private records = new Map<PathKey, TagSet>();

  constructor(options: TagDatabaseOptions) {
    this.filePath = options.filePath;
    this.config = options.config;
    this.cwd = options.cwd ?? process.cwd();
  }

  static open(options: TagDatabaseOptions): TagDatabase {
    const db = new TagDatabase(options);
    db.load();
    return db;
  }

  get caseSensitive(): boolean {
    return this.config.get('search.case_sensitive');
  }

  get size(): number {
    return this.records.size;
  }

  // ============================================================================
  // Persistence
  // ============================================================================

  /**
   * Replaces in-memory state with the backing file's contents.
   * A missing file is an empty database.
   */
  load(): void {
    const data = readJsonFile(this.filePath);
    if (data === undefined) {
      this.records = new Map();
      return;
    }

    const parsed = TagDocumentSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('/')}` : '';
      throw new StorageError(
        `${this.filePath} is not a path -> tag list document${where}: ${issue?.message ?? 'invalid'}`,
        this.filePath
      );
    }

    // zod's record parse drops keys such as `__proto__` without an issue.
    if (typeof data === 'object' && data !== null) {
      for (const key of Object.keys(data)) {
        if (!Object.hasOwn(parsed.data, key)) {
          console.warn(`[TagDatabase] Skipping record with unsupported path key: ${key}`);
        }
      }
    }

    this.records = this.fromDocument(parsed.data);
  }

  /**
   * Validates every record, then atomically replaces the backing file.
   */
  save(): void {
    const issues = this.validate();
    if (issues.length > 0) {
      const first = issues[0];
      throw new ValidationError(`Refusing to save ${issues.length} invalid record(s); first: ${first.error.message}`, {
        path: first.path,
        issues: issues.map((issue) => issue.error.message),
      });
    }
    writeFileAtomic(this.filePath, `${JSON.stringify(this.toDocument(), null, 2)}\n`);
  }

  validate(): RecordIssue[] {
    const max = this.config.get('tags.max_per_file');
    const issues: RecordIssue[] = [];

    for (const [path, tags] of this.records) {
      if (tags.size === 0) {
        issues.push({ path, error: new ValidationError(`${path}: record has no tags`, { path }) });
      } else if (tags.size > max) {
        issues.push({
          path,
          error: new ValidationError(`${path}: ${tags.size} tags exceeds the limit of ${max}`, {
            path,
            key: 'tags.max_per_file',
          }),
        });
      }
      for (const tag of tags) {
        const check = normalizeTag(tag);
        if (!check.success || check.value !== tag) {
          issues.push({ path, error: new ValidationError(`${path}: tag "${tag}" is not normalized`, { path, tag }) });
        }
      }
    }

    return issues;
  }

  toDocument(): TagDocument {
    const doc: TagDocument = {};
    for (const [path, tags] of this.records) {
      doc[path] = tags.values();
    }
    return doc;
  }

  private fromDocument(doc: TagDocument): Map<PathKey, TagSet> {
    const records = new Map<PathKey, TagSet>();

    for (const [rawPath, rawTags] of Object.entries(doc)) {
      const key = toPathKey(rawPath, this.cwd);
      if (!key.success) {
        console.warn(`[TagDatabase] Skipping record with invalid path: ${key.error.message}`);
        continue;
      }

      const tags = records.get(key.value) ?? new TagSet(this.caseSensitive);
      for (const rawTag of rawTags) {
        const tag = normalizeTag(rawTag);
        if (tag.success) {
          tags.add(tag.value);
        } else {
          console.warn(`[TagDatabase] Dropping blank tag on ${key.value}`);
        }
      }

      if (tags.size === 0) {
        console.warn(`[TagDatabase] Skipping ${key.value}: no tags`);
        continue;
      }
      records.set(key.value, tags);
    }

    return records;
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /**
   * Unions `tags` into the record for `path`, creating it if needed.
   * Re-adding an existing tag is a no-op.
   */
  addTags(path: string, tags: readonly unknown[]): Result<Tag[]> {
    const key = toPathKey(path, this.cwd);
    if (!key.success) return key;
    const normalized = normalizeTags(tags);
    if (!normalized.success) return fail(atPath(normalized.error, key.value));

    const current = this.records.get(key.value);
    const next = current ? current.clone() : new TagSet(this.caseSensitive);
    for (const tag of normalized.value) {
      next.add(tag);
    }

    const limit = this.checkLimit(key.value, next);
    if (!limit.success) return limit;
    if (next.size > 0) {
      this.records.set(key.value, next);
    }
    return ok(next.values());
  }

  /**
   * Removes `tags` from the record. Tags not present are ignored;
   * a record left with no tags is deleted.
   */
  removeTags(path: string, tags: readonly unknown[]): Result<Tag[]> {
    const key = toPathKey(path, this.cwd);
    if (!key.success) return key;
    const normalized = normalizeTags(tags);
    if (!normalized.success) return fail(atPath(normalized.error, key.value));

    const current = this.records.get(key.value);
    if (!current) return ok([]);

    const next = current.clone();
    for (const tag of normalized.value) {
      next.delete(tag);
    }
    if (next.size === 0) {
      this.records.delete(key.value);
    } else {
      this.records.set(key.value, next);
    }
    return ok(next.values());
  }

  /**
   * Sets the record to exactly `tags`. An empty list deletes the record.
   */
  replaceTags(path: string, tags: readonly unknown[]): Result<Tag[]> {
    const key = toPathKey(path, this.cwd);
    if (!key.success) return key;
    const normalized = normalizeTags(tags);
    if (!normalized.success) return fail(atPath(normalized.error, key.value));

    const next = new TagSet(this.caseSensitive, normalized.value);
    const limit = this.checkLimit(key.value, next);
    if (!limit.success) return limit;

    if (next.size === 0) {
      this.records.delete(key.value);
    } else {
      this.records.set(key.value, next);
    }
    return ok(next.values());
  }

  /** Returns whether a record was deleted. */
  removePath(path: string): boolean {
    const key = toPathKey(path, this.cwd);
    if (!key.success) return false;
    return this.records.delete(key.value);
  }

  private checkLimit(path: PathKey, tags: TagSet): Result<true> {
    const max = this.config.get('tags.max_per_file');
    if (tags.size <= max) return ok(true);
    return fail(
      new ValidationError(`${path}: ${tags.size} tags would exceed the limit of ${max}`, {
        path,
        key: 'tags.max_per_file',
      })
    );
  }

  // ============================================================================
  // Reads
  // ============================================================================

  resolvePath(path: string): Result<PathKey> {
    return toPathKey(path, this.cwd);
  }

  has(path: string): boolean {
    const key = toPathKey(path, this.cwd);
    return key.success && this.records.has(key.value);
  }

  getTags(path: string): Tag[] | undefined {
    const key = toPathKey(path, this.cwd);
    if (!key.success) return undefined;
    return this.records.get(key.value)?.values();
  }

  paths(): PathKey[] {
    return [...this.records.keys()];
  }

  /** Records in stable insertion order; each tag array is a fresh copy. */
  *entries(): IterableIterator<[PathKey, Tag[]]> {
    for (const [path, tags] of this.records) {
      yield [path, tags.values()];
    }
  }

  /** Records as independent TagSet copies, for set comparisons. */
  *tagSets(): IterableIterator<[PathKey, TagSet]> {
    for (const [path, tags] of this.records) {
      yield [path, tags.clone()];
    }
  }

  // ============================================================================
  // Working copies
  // ============================================================================

  /** Independent copy bound to the same backing file. */
  clone(): TagDatabase {
    const copy = new TagDatabase({ filePath: this.filePath, config: this.config, cwd: this.cwd });
    copy.records = this.copyRecords();
    return copy;
  }

  /** Takes over the records of another copy. */
  adopt(other: TagDatabase): void {
    this.records = other.copyRecords();
  }

  private copyRecords(): Map<PathKey, TagSet> {
    const out = new Map<PathKey, TagSet>();
    for (const [path, tags] of this.records) {
      out.set(path, tags.clone());
    }
    return out;
  }
}

export { BackupManager, type BackupManagerOptions } from './backups';
export { writeFileAtomic, readJsonFile } from './fs-utils';
