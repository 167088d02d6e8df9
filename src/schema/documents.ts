import { index, integer, jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { sources } from './sources';

export const documents = pgTable(
  'documents',
  {
    id: text('id').primaryKey(),
    external_id: text('external_id'),
    source: text('source').notNull(),
    source_id: text('source_id')
      .notNull()
      .references(() => sources.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    url: text('url'),
    authors: jsonb('authors').$type<string[]>().notNull().default([]),
    published_at: timestamp('published_at', { withTimezone: true }),
    added_at: timestamp('added_at', { withTimezone: true }).notNull().defaultNow(),
    abstract: text('abstract'),
    text: text('text'),
    raw_uri: text('raw_uri'),
    checksum: text('checksum'),
    topics: jsonb('topics').$type<string[]>().notNull().default([]),
    risk_areas: jsonb('risk_areas').$type<string[]>().notNull().default([]),
    tags: jsonb('tags').$type<string[]>().notNull().default([]),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    version: integer('version').notNull().default(1),
  },
  (table) => ({
    sourceIdx: index('idx_documents_source').on(table.source),
    sourceIdIdx: index('idx_documents_source_id').on(table.source_id),
    publishedAtIdx: index('idx_documents_published_at').on(table.published_at),
  })
);

export type Document = typeof documents.$inferSelect;
export type NewDocument = typeof documents.$inferInsert;
