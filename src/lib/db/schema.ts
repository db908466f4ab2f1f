import { integer, pgTable, pgView, text, timestamp, varchar } from 'drizzle-orm/pg-core';

/**
 * Read model over every ingested source. Keys keep the column names so rows
 * can go straight through the unified-datasets adapter.
 */
export const unifiedDatasets = pgView('unified_datasets', {
  source: text('source').notNull(),
  dataset_id: varchar('dataset_id', { length: 255 }).notNull(),
  title: text('title').notNull(),
  modality: varchar('modality', { length: 100 }),
  citations: integer('citations'),
  url: text('url').notNull(),
  description: text('description'),
  created_at: timestamp('created_at', { mode: 'string' }),
  updated_at: timestamp('updated_at', { mode: 'string' }),
  version: varchar('version', { length: 64 }),
}).existing();

/** Multi-source ingestion table; read directly when the view is missing. */
export const neuroscienceDatasets = pgTable('neuroscience_datasets', {
  source: text('source').notNull(),
  dataset_id: varchar('dataset_id', { length: 255 }).notNull(),
  title: text('title').notNull(),
  modality: varchar('modality', { length: 100 }),
  citations: integer('citations'),
  url: text('url').notNull(),
  description: text('description'),
  created_at: timestamp('created_at', { mode: 'string' }),
  updated_at: timestamp('updated_at', { mode: 'string' }),
});
