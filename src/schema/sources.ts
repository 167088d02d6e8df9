import { boolean, integer, jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import type { IngestionMode, IngestionRunStatus } from '../lib/ingestion/types';

export const sources = pgTable('sources', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  kind: text('kind').notNull(),
  canonical_url: text('canonical_url').notNull(),
  ingestion_mode: text('ingestion_mode').$type<IngestionMode>().notNull(),
  is_active: boolean('is_active').notNull().default(true),
  last_ingested_at: timestamp('last_ingested_at', { withTimezone: true }),
  last_ingestion_status: text('last_ingestion_status').$type<IngestionRunStatus>(),
  last_error_message: text('last_error_message'),
  doc_count: integer('doc_count').notNull().default(0),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type Source = typeof sources.$inferSelect;
export type NewSource = typeof sources.$inferInsert;
