import { z } from 'zod';
import { DatasetSourceSchema } from '../lib/sources';
import type { DatasetRecord } from '../lib/types';

const OptionalText = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const Timestamp = z
  .union([z.string(), z.date(), z.null()])
  .optional()
  .transform((value) => {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
    }
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const Identifier = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const UnifiedDatasetRowSchema = z
  .object({
    source: DatasetSourceSchema,
    dataset_id: Identifier.optional(),
    id: Identifier.optional(),
    title: z.string().trim().min(1),
    modality: OptionalText,
    citations: z
      .union([z.number(), z.string(), z.null()])
      .optional()
      .transform((value) => {
        const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : value;
        return typeof parsed === 'number' && Number.isFinite(parsed) && parsed > 0 ? Math.trunc(parsed) : 0;
      }),
    url: z.string(),
    description: OptionalText,
    created_at: Timestamp,
    updated_at: Timestamp,
    version: OptionalText,
  })
  .passthrough()
  .refine((row) => Boolean(row.dataset_id || row.id), { message: 'Row has no dataset identifier' });

type UnifiedDatasetRow = z.infer<typeof UnifiedDatasetRowSchema>;

export type AdaptedRows = {
  records: DatasetRecord[];
  skipped: number;
};

const toDatasetRecord = (row: UnifiedDatasetRow): DatasetRecord => {
  const record: DatasetRecord = {
    source: row.source,
    id: row.dataset_id || row.id || '',
    title: row.title,
    citations: row.citations,
    url: row.url,
  };
  if (row.modality) record.modality = row.modality;
  if (row.description) record.description = row.description;
  if (row.created_at) record.createdAt = row.created_at;
  if (row.updated_at) record.updatedAt = row.updated_at;
  if (row.version) record.version = row.version;
  return record;
};

/**
 * Rows that fail validation are skipped rather than thrown. A repeated
 * (source, id) keeps the first row seen.
 */
export const toDatasetRecords = (rows: unknown): AdaptedRows => {
  const list = Array.isArray(rows) ? rows : [];
  const seen = new Set<string>();
  const records: DatasetRecord[] = [];
  let skipped = 0;

  for (const row of list) {
    const parsed = UnifiedDatasetRowSchema.safeParse(row);
    if (!parsed.success) {
      skipped += 1;
      continue;
    }
    const record = toDatasetRecord(parsed.data);
    const key = `${record.source}\u0000${record.id}`;
    if (seen.has(key)) {
      skipped += 1;
      continue;
    }
    seen.add(key);
    records.push(record);
  }

  return { records, skipped };
};
