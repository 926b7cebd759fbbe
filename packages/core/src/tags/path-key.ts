import * as path from 'path';
import { z } from 'zod';
import { ValidationError, fail, ok, type Result } from '../errors';

/**
 * Canonical absolute path used as record identity.
 * `path.resolve` folds `.`/`..` segments, repeated and trailing separators,
 * so different spellings of one location produce one key.
 */
export const PathKeySchema = z
  .string({ invalid_type_error: 'path must be a string' })
  .refine((p) => p.trim().length > 0, 'path must not be empty')
  .transform((p) => path.resolve(p))
  .brand<'PathKey'>();

export type PathKey = z.infer<typeof PathKeySchema>;

export function toPathKey(raw: unknown, cwd: string = process.cwd()): Result<PathKey> {
  const input = typeof raw === 'string' && raw.trim().length > 0 ? path.resolve(cwd, raw) : raw;
  const parsed = PathKeySchema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const shown = typeof raw === 'string' ? raw : String(raw);
  const reason = parsed.error.issues[0]?.message ?? 'invalid path';
  return fail(new ValidationError(`Invalid path "${shown}": ${reason}`, { path: shown }));
}
