import * as fs from 'fs';
import * as path from 'path';
import { TagDocumentSchema, type BackupInfo, type TagDocument } from '../contracts';
import { StorageError } from '../errors';
import { readJsonFile, writeFileAtomic } from './fs-utils';

export interface BackupManagerOptions {
  /** Directory holding backup files. Created on first write. */
  backupDir: string;
  /** Number of backups retained; older ones are pruned first. */
  keep: number;
  now?: () => Date;
}

// tags-20261019T174102123Z-000.json
const BACKUP_FILE_PATTERN = /^tags-(\d{8}T\d{9}Z)-(\d{3})\.json$/;

function stamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

function parseStamp(value: string): number {
  const iso = `${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}T${value.slice(9, 11)}:${value.slice(11, 13)}:${value.slice(13, 15)}.${value.slice(15, 18)}Z`;
  return Date.parse(iso);
}

/**
 * Timestamped, immutable snapshots of the full tag document.
 * File names sort chronologically, so FIFO pruning is a sort by name.
 */
export class BackupManager {
  readonly backupDir: string;
  private readonly keep: number;
  private readonly now: () => Date;

  constructor(options: BackupManagerOptions) {
    this.backupDir = options.backupDir;
    this.keep = options.keep;
    this.now = options.now ?? (() => new Date());
  }

  create(document: TagDocument): BackupInfo {
    const created = this.now();
    const prefix = `tags-${stamp(created)}`;

    // A new backup sorts after every backup sharing its stamp.
    let seq = 0;
    for (const backup of this.list()) {
      const match = BACKUP_FILE_PATTERN.exec(`${backup.id}.json`);
      if (match && `tags-${match[1]}` === prefix) {
        seq = Math.max(seq, Number(match[2]) + 1);
      }
    }
    const fileName = `${prefix}-${String(seq).padStart(3, '0')}.json`;

    const filePath = path.join(this.backupDir, fileName);
    writeFileAtomic(filePath, `${JSON.stringify(document, null, 2)}\n`);
    console.log(`[Backup] Created ${fileName} (${Object.keys(document).length} records)`);

    this.prune(this.keep);
    return { id: fileName.replace(/\.json$/, ''), filePath, createdAt: created.getTime() };
  }

  /** Backups, oldest first. */
  list(): BackupInfo[] {
    let names: string[];
    try {
      if (!fs.existsSync(this.backupDir)) {
        return [];
      }
      names = fs.readdirSync(this.backupDir);
    } catch (error) {
      throw new StorageError(`Cannot list backups in ${this.backupDir}`, this.backupDir, error);
    }

    const backups: BackupInfo[] = [];
    for (const name of names.sort()) {
      const match = BACKUP_FILE_PATTERN.exec(name);
      if (!match) continue;
      backups.push({
        id: name.replace(/\.json$/, ''),
        filePath: path.join(this.backupDir, name),
        createdAt: parseStamp(match[1]),
      });
    }
    return backups;
  }

  /**
   * Deletes the oldest backups beyond `keep`. Returns the deleted ids.
   */
  prune(keep: number): string[] {
    const backups = this.list();
    const excess = backups.slice(0, Math.max(0, backups.length - keep));

    for (const backup of excess) {
      try {
        fs.rmSync(backup.filePath);
      } catch (error) {
        throw new StorageError(`Cannot delete backup ${backup.id}`, backup.filePath, error);
      }
    }
    if (excess.length > 0) {
      console.log(`[Backup] Pruned ${excess.length} old backup(s)`);
    }
    return excess.map((backup) => backup.id);
  }

  read(id: string): TagDocument {
    const backup = this.list().find((b) => b.id === id);
    if (!backup) {
      throw new StorageError(`Backup not found: ${id}`, path.join(this.backupDir, `${id}.json`));
    }

    const parsed = TagDocumentSchema.safeParse(readJsonFile(backup.filePath));
    if (!parsed.success) {
      throw new StorageError(`Backup ${id} is not a valid tag document`, backup.filePath);
    }
    return parsed.data;
  }
}
