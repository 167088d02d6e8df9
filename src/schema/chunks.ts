import { index, integer, jsonb, pgTable, text, timestamp, vector } from 'drizzle-orm/pg-core';
import { EMBEDDING_DIMENSIONS } from '../lib/ingestion/types';
import { documents } from './documents';

export const chunks = pgTable(
  'chunks',
  {
    id: text('id').primaryKey(),
    doc_id: text('doc_id')
      .notNull()
      .references(() => documents.id, { onDelete: 'cascade' }),
    chunk_index: integer('chunk_index').notNull(),
    text: text('text').notNull(),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
    topics: jsonb('topics').$type<string[]>().notNull().default([]),
    risk_areas: jsonb('risk_areas').$type<string[]>().notNull().default([]),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    docIdIdx: index('idx_chunks_doc_id').on(table.doc_id),
    topicsIdx: index('idx_chunks_topics').using('gin', table.topics.op('jsonb_path_ops')),
    embeddingIdx: index('idx_chunks_embedding').using('ivfflat', table.embedding.op('vector_cosine_ops')),
  })
);

export type Chunk = typeof chunks.$inferSelect;
export type NewChunk = typeof chunks.$inferInsert;
