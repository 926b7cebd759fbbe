import { z } from 'zod';

// ============================================================================
// Persisted Tag Document Schema
// ============================================================================

/**
 * On-disk shape of the tag store: absolute path -> ordered list of tags.
 * Structural check only; tag normalisation happens in the database layer.
 */
export const TagDocumentSchema = z.record(z.string(), z.array(z.string()));

export type TagDocument = z.infer<typeof TagDocumentSchema>;

// ============================================================================
// Bulk Operation Schema
// ============================================================================

const OperationTagsSchema = z.array(z.string()).min(1, 'at least one tag is required');

export const TagOperationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('add'), tags: OperationTagsSchema }),
  z.object({ kind: z.literal('remove'), tags: OperationTagsSchema }),
  z.object({ kind: z.literal('replace'), tags: OperationTagsSchema }),
]);

export type TagOperation = z.infer<typeof TagOperationSchema>;
export type TagOperationKind = TagOperation['kind'];

export const BulkOptionsSchema = z.object({
  dryRun: z.boolean().optional().default(false),
});

export type BulkOptions = z.input<typeof BulkOptionsSchema>;

// ============================================================================
// Configuration Values Schema
// ============================================================================

const UnitIntervalSchema = z.number().min(0).max(1);

export const ConfigValuesSchema = z.object({
  'search.fuzzy_threshold': UnitIntervalSchema,
  'search.case_sensitive': z.boolean(),
  'tags.max_per_file': z.number().int().min(1),
  'backup.auto_backup': z.boolean(),
  'backup.on_bulk_operations': z.boolean(),
  'backup.count': z.number().int().min(1),
  'filter.similarity_threshold': UnitIntervalSchema,
});

export type ConfigValues = z.infer<typeof ConfigValuesSchema>;
export type ConfigKey = keyof ConfigValues;

// ============================================================================
// Backup Metadata Schema
// ============================================================================

export const BackupInfoSchema = z.object({
  id: z.string(),
  filePath: z.string(),
  createdAt: z.number(), // Unix timestamp in ms
});

export type BackupInfo = z.infer<typeof BackupInfoSchema>;
