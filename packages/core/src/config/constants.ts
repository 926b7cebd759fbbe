/**
 * Default configuration values.
 * Every threshold and limit the core consumes is defined here.
 */

import type { ConfigValues } from '../contracts';

// ============================================================================
// SEARCH
// ============================================================================

/** Minimum tag similarity (0-1) for a fuzzy match. */
export const DEFAULT_FUZZY_THRESHOLD = 0.6;

/** Tags differing only in case are the same tag unless this is true. */
export const DEFAULT_CASE_SENSITIVE = false;

// ============================================================================
// TAGS
// ============================================================================

export const DEFAULT_MAX_TAGS_PER_FILE = 50;

// ============================================================================
// BACKUPS
// ============================================================================

export const DEFAULT_AUTO_BACKUP = true;
export const DEFAULT_BACKUP_ON_BULK = true;
export const DEFAULT_BACKUP_COUNT = 5; // Oldest pruned first beyond this

// ============================================================================
// FILTERS
// ============================================================================

/** Jaccard index at or above which two records count as similar. */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

/** Top-N tag lists in statistics. */
export const STATS_TOP_TAGS_LIMIT = 10;

/** Prefix of environment variables read by EnvConfigLoader. */
export const ENV_PREFIX = 'TAGSHELF_';

export const DEFAULT_CONFIG: ConfigValues = {
  'search.fuzzy_threshold': DEFAULT_FUZZY_THRESHOLD,
  'search.case_sensitive': DEFAULT_CASE_SENSITIVE,
  'tags.max_per_file': DEFAULT_MAX_TAGS_PER_FILE,
  'backup.auto_backup': DEFAULT_AUTO_BACKUP,
  'backup.on_bulk_operations': DEFAULT_BACKUP_ON_BULK,
  'backup.count': DEFAULT_BACKUP_COUNT,
  'filter.similarity_threshold': DEFAULT_SIMILARITY_THRESHOLD,
};
