import { and, asc, cosineDistance, eq, gte, inArray, isNotNull, lte, sql, type SQL } from 'drizzle-orm';
import {
  chunks,
  documents,
  sourceRecords,
  sources,
  type Chunk,
  type Document,
  type NewSourceRecord,
  type Source,
  type SourceRecord,
} from '../../schema';
import { getDatabase, type Database } from '../db';
import { sourceRecordIdFor } from '../ingestion/checksums';
import { EMBEDDING_DIMENSIONS, type IngestionRunStatus } from '../ingestion/types';
import type { SearchFilters } from '../ingestion/validation';
import { yearEnd, yearStart } from '../retrieval/filters';
import type {
  ChunkWrite,
  KnowledgeStore,
  ScoredChunk,
  SourceRecordUpsert,
  SourceUpsert,
} from './types';

type Executor = Database | Parameters<Parameters<Database['transaction']>[0]>[0];

const CHUNK_INSERT_BATCH_SIZE = 500;

function assertDimensions(vector: readonly number[], label: string): void {
  if (vector.length !== EMBEDDING_DIMENSIONS) {
    throw new Error(
      `${label} has ${vector.length} dimensions; the chunks.embedding column stores ${EMBEDDING_DIMENSIONS}`
    );
  }
}

async function refreshDocCount(executor: Executor, sourceId: string): Promise<void> {
  await executor
    .update(sources)
    .set({
      doc_count: sql`(select count(*)::int from ${documents} where ${documents.source_id} = ${sourceId})`,
      updated_at: new Date(),
    })
    .where(eq(sources.id, sourceId));
}

export function buildSearchConditions(filters: SearchFilters): SQL[] {
  const conditions: SQL[] = [isNotNull(chunks.embedding)];

  if (filters.topics && filters.topics.length > 0) {
    conditions.push(sql`${chunks.topics} @> ${JSON.stringify(filters.topics)}::jsonb`);
  }
  if (filters.riskAreas && filters.riskAreas.length > 0) {
    conditions.push(sql`${chunks.risk_areas} @> ${JSON.stringify(filters.riskAreas)}::jsonb`);
  }
  if (filters.sources && filters.sources.length > 0) {
    conditions.push(inArray(documents.source, filters.sources));
  }
  if (filters.yearMin !== undefined) {
    conditions.push(gte(documents.published_at, yearStart(filters.yearMin)));
  }
  if (filters.yearMax !== undefined) {
    conditions.push(lte(documents.published_at, yearEnd(filters.yearMax)));
  }
  // Top-level key equality, not containment: {tags: ['a']} must not match {tags: ['a', 'b']}.
  for (const [key, value] of Object.entries(filters.metadata)) {
    conditions.push(sql`${documents.metadata} -> ${key}::text = ${JSON.stringify(value)}::jsonb`);
  }

  return conditions;
}

export class PostgresKnowledgeStore implements KnowledgeStore {
  constructor(private readonly db: Database) {}

  async upsertSource(input: SourceUpsert): Promise<Source> {
    const now = new Date();
    const [row] = await this.db
      .insert(sources)
      .values({
        id: input.id,
        name: input.name,
        kind: input.kind,
        canonical_url: input.canonical_url,
        ingestion_mode: input.ingestion_mode,
        is_active: input.is_active ?? true,
        metadata: input.metadata,
        created_at: now,
        updated_at: now,
      })
      .onConflictDoUpdate({
        target: sources.id,
        set: {
          name: input.name,
          kind: input.kind,
          canonical_url: input.canonical_url,
          ingestion_mode: input.ingestion_mode,
          metadata: input.metadata,
          updated_at: now,
          ...(input.is_active !== undefined ? { is_active: input.is_active } : {}),
        },
      })
      .returning();

    if (!row) {
      throw new Error(`Upsert of source ${input.id} returned no row`);
    }
    return row;
  }

  async getSource(sourceId: string): Promise<Source | null> {
    const [row] = await this.db.select().from(sources).where(eq(sources.id, sourceId)).limit(1);
    return row ?? null;
  }

  async listSources(options: { activeOnly?: boolean } = {}): Promise<Source[]> {
    return this.db
      .select()
      .from(sources)
      .where(options.activeOnly ? eq(sources.is_active, true) : undefined)
      .orderBy(asc(sources.name));
  }

  async findSourcesByUrl(url: string): Promise<Source[]> {
    return this.db.select().from(sources).where(eq(sources.canonical_url, url));
  }

  async setSourceActive(sourceId: string, isActive: boolean): Promise<Source | null> {
    const [row] = await this.db
      .update(sources)
      .set({ is_active: isActive, updated_at: new Date() })
      .where(eq(sources.id, sourceId))
      .returning();
    return row ?? null;
  }

  async deleteSources(sourceIds: string[]): Promise<number> {
    if (sourceIds.length === 0) {
      return 0;
    }
    const deleted = await this.db
      .delete(sources)
      .where(inArray(sources.id, sourceIds))
      .returning({ id: sources.id });
    return deleted.length;
  }

  async recordIngestionStatus(
    sourceId: string,
    status: IngestionRunStatus,
    error: string | null = null,
    at: Date = new Date()
  ): Promise<void> {
    await this.db
      .update(sources)
      .set({
        last_ingested_at: at,
        last_ingestion_status: status,
        last_error_message: error,
        updated_at: new Date(),
      })
      .where(eq(sources.id, sourceId));
  }

  async getDocument(documentId: string): Promise<Document | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, documentId)).limit(1);
    return row ?? null;
  }

  async listDocumentsForSource(sourceId: string): Promise<Document[]> {
    return this.db
      .select()
      .from(documents)
      .where(eq(documents.source_id, sourceId))
      .orderBy(asc(documents.id));
  }

  async saveDocument(document: Document, chunkRows: ChunkWrite[] | null): Promise<Document> {
    for (const chunk of chunkRows ?? []) {
      if (chunk.embedding) {
        assertDimensions(chunk.embedding, `Embedding for chunk ${chunk.id}`);
      }
    }

    return this.db.transaction(async (tx) => {
      const [previous] = await tx
        .select({ source_id: documents.source_id })
        .from(documents)
        .where(eq(documents.id, document.id))
        .limit(1);

      const { id: documentId, ...fields } = document;
      const [saved] = await tx
        .insert(documents)
        .values(document)
        .onConflictDoUpdate({ target: documents.id, set: fields })
        .returning();

      if (!saved) {
        throw new Error(`Upsert of document ${documentId} returned no row`);
      }

      if (chunkRows !== null) {
        await tx.delete(chunks).where(eq(chunks.doc_id, documentId));
        const createdAt = new Date();
        for (let start = 0; start < chunkRows.length; start += CHUNK_INSERT_BATCH_SIZE) {
          const batch = chunkRows.slice(start, start + CHUNK_INSERT_BATCH_SIZE);
          await tx.insert(chunks).values(batch.map((chunk) => ({ ...chunk, created_at: createdAt })));
        }
      }

      await refreshDocCount(tx, document.source_id);
      if (previous && previous.source_id !== document.source_id) {
        await refreshDocCount(tx, previous.source_id);
      }
      return saved;
    });
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const [deleted] = await tx
        .delete(documents)
        .where(eq(documents.id, documentId))
        .returning({ source_id: documents.source_id });
      if (!deleted) {
        return false;
      }
      await refreshDocCount(tx, deleted.source_id);
      return true;
    });
  }

  async getChunksForDocument(documentId: string): Promise<Chunk[]> {
    return this.db
      .select()
      .from(chunks)
      .where(eq(chunks.doc_id, documentId))
      .orderBy(asc(chunks.chunk_index));
  }

  async listTopics(): Promise<string[]> {
    const rows = await this.db.execute<{ topic: string }>(
      sql`select distinct jsonb_array_elements_text(${documents.topics}) as topic from ${documents} order by topic`
    );
    return rows.map((row) => row.topic);
  }

  async searchChunks(queryVector: number[], filters: SearchFilters, limit: number): Promise<ScoredChunk[]> {
    assertDimensions(queryVector, 'Query embedding');
    const distance = cosineDistance(chunks.embedding, queryVector).mapWith(Number);

    const rows = await this.db
      .select({ chunk: chunks, document: documents, distance })
      .from(chunks)
      .innerJoin(documents, eq(chunks.doc_id, documents.id))
      .where(and(...buildSearchConditions(filters)))
      .orderBy(distance)
      .limit(limit);

    return rows.map((row) => ({
      chunk: row.chunk,
      document: row.document,
      score: 1 - row.distance,
    }));
  }

  async getSourceRecord(sourceId: string, externalId: string): Promise<SourceRecord | null> {
    const [row] = await this.db
      .select()
      .from(sourceRecords)
      .where(and(eq(sourceRecords.source, sourceId), eq(sourceRecords.external_id, externalId)))
      .limit(1);
    return row ?? null;
  }

  async listSourceRecords(sourceId: string): Promise<SourceRecord[]> {
    return this.db
      .select()
      .from(sourceRecords)
      .where(eq(sourceRecords.source, sourceId))
      .orderBy(asc(sourceRecords.external_id));
  }

  async upsertSourceRecord(input: SourceRecordUpsert): Promise<SourceRecord> {
    const set: Partial<NewSourceRecord> = { status: input.status };
    if (input.last_fetched_at !== undefined) {
      set.last_fetched_at = input.last_fetched_at;
    }
    if (input.doc_id !== undefined) {
      set.doc_id = input.doc_id;
    }
    if (input.error_message !== undefined) {
      set.error_message = input.error_message;
    }

    const [row] = await this.db
      .insert(sourceRecords)
      .values({
        id: sourceRecordIdFor(input.source, input.external_id),
        source: input.source,
        external_id: input.external_id,
        status: input.status,
        last_fetched_at: input.last_fetched_at ?? null,
        doc_id: input.doc_id ?? null,
        error_message: input.error_message ?? null,
      })
      .onConflictDoUpdate({ target: [sourceRecords.source, sourceRecords.external_id], set })
      .returning();

    if (!row) {
      throw new Error(`Upsert of source record ${input.source}/${input.external_id} returned no row`);
    }
    return row;
  }
}

export async function createPostgresKnowledgeStore(databaseUrl?: string): Promise<PostgresKnowledgeStore> {
  return new PostgresKnowledgeStore(await getDatabase(databaseUrl));
}
