import { z } from 'zod';
import { ValidationError, fail, ok, type Result } from '../errors';

/**
 * A tag label: trimmed, non-empty. Casing is kept exactly as entered;
 * the comparison policy decides whether two spellings are the same tag.
 */
export const TagSchema = z
  .string({ invalid_type_error: 'tag must be a string' })
  .trim()
  .min(1, 'tag must not be empty')
  .brand<'Tag'>();

export type Tag = z.infer<typeof TagSchema>;

export function normalizeTag(raw: unknown): Result<Tag> {
  const parsed = TagSchema.safeParse(raw);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const tag = typeof raw === 'string' ? raw : String(raw);
  const reason = parsed.error.issues[0]?.message ?? 'invalid tag';
  return fail(new ValidationError(`Invalid tag "${tag}": ${reason}`, { tag }));
}

/**
 * Normalizes every entry, collecting all rejected tags rather than stopping at the first.
 */
export function normalizeTags(raw: readonly unknown[]): Result<Tag[]> {
  const tags: Tag[] = [];
  const issues: string[] = [];
  let firstBad: string | undefined;

  for (const entry of raw) {
    const result = normalizeTag(entry);
    if (result.success) {
      tags.push(result.value);
    } else {
      issues.push(result.error.message);
      firstBad ??= result.error.tag;
    }
  }

  if (issues.length > 0) {
    return fail(new ValidationError(issues.join('; '), { tag: firstBad, issues }));
  }
  return ok(tags);
}

/** Key two tags are compared by under the active case policy. */
export function comparisonKey(tag: string, caseSensitive: boolean): string {
  return caseSensitive ? tag : tag.toLowerCase();
}
