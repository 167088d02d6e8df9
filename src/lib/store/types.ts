import type { Chunk, Document, Source, SourceRecord } from '../../schema';
import type { ParsedSourceInput, SearchFilters } from '../ingestion/validation';
import type { IngestionRunStatus, SourceRecordStatus } from '../ingestion/types';

export type SourceUpsert = ParsedSourceInput & { id: string };

export type SourceRecordUpsert = {
  source: string;
  external_id: string;
  status: SourceRecordStatus;
  last_fetched_at?: Date | null;
  /** Omitted keeps the linked document of an existing record. */
  doc_id?: string | null;
  error_message?: string | null;
};

export type ChunkWrite = Omit<Chunk, 'created_at'>;

export type ScoredChunk = {
  chunk: Chunk;
  document: Document;
  score: number;
};

/**
 * Persistence seam shared by the Postgres store and the in-process store.
 */
export interface KnowledgeStore {
  upsertSource(source: SourceUpsert): Promise<Source>;
  getSource(sourceId: string): Promise<Source | null>;
  listSources(options?: { activeOnly?: boolean }): Promise<Source[]>;
  findSourcesByUrl(url: string): Promise<Source[]>;
  setSourceActive(sourceId: string, isActive: boolean): Promise<Source | null>;
  /** Cascades to documents and chunks; source records lose their doc_id. */
  deleteSources(sourceIds: string[]): Promise<number>;
  recordIngestionStatus(
    sourceId: string,
    status: IngestionRunStatus,
    error?: string | null,
    at?: Date
  ): Promise<void>;

  getDocument(documentId: string): Promise<Document | null>;
  listDocumentsForSource(sourceId: string): Promise<Document[]>;
  /**
   * Inserts or replaces a document. When `chunks` is given, the document's
   * chunks are replaced by it in the same unit of work.
   */
  saveDocument(document: Document, chunks: ChunkWrite[] | null): Promise<Document>;
  deleteDocument(documentId: string): Promise<boolean>;
  getChunksForDocument(documentId: string): Promise<Chunk[]>;
  listTopics(): Promise<string[]>;
  searchChunks(queryVector: number[], filters: SearchFilters, limit: number): Promise<ScoredChunk[]>;

  getSourceRecord(sourceId: string, externalId: string): Promise<SourceRecord | null>;
  listSourceRecords(sourceId: string): Promise<SourceRecord[]>;
  upsertSourceRecord(record: SourceRecordUpsert): Promise<SourceRecord>;
}
