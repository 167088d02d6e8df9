import { pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import type { SourceRecordStatus } from '../lib/ingestion/types';
import { documents } from './documents';

export const sourceRecords = pgTable(
  'source_records',
  {
    id: text('id').primaryKey(),
    source: text('source').notNull(),
    external_id: text('external_id').notNull(),
    last_fetched_at: timestamp('last_fetched_at', { withTimezone: true }),
    doc_id: text('doc_id').references(() => documents.id, { onDelete: 'set null' }),
    status: text('status').$type<SourceRecordStatus>().notNull().default('new'),
    error_message: text('error_message'),
  },
  (table) => ({
    uniqueSourceExternalId: uniqueIndex('idx_source_records_unique_source').on(
      table.source,
      table.external_id
    ),
  })
);

export type SourceRecord = typeof sourceRecords.$inferSelect;
export type NewSourceRecord = typeof sourceRecords.$inferInsert;
