import * as fs from 'fs';
import * as path from 'path';
import { StorageError } from '../errors';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes `content` beside `filePath` and renames it into place, so readers
 * see either the old file or the new one. On failure the temporary file is
 * removed and the original is untouched.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, { encoding: 'utf8' });
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    if (fs.existsSync(tmpPath)) {
      fs.rmSync(tmpPath, { force: true });
    }
    console.error(`[Storage] Failed to write ${filePath}:`, error);
    throw new StorageError(`Cannot write ${filePath}: ${describe(error)}`, filePath, error);
  }
}

/**
 * Reads a JSON file. Returns undefined when the file does not exist
 * or holds only whitespace.
 */
export function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new StorageError(`Cannot read ${filePath}: ${describe(error)}`, filePath, error);
  }

  if (text.trim().length === 0) {
    console.warn(`[Storage] ${filePath} is empty, treating it as an empty store`);
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StorageError(`${filePath} is not valid JSON: ${describe(error)}`, filePath, error);
  }
}
