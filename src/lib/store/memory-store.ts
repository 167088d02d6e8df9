import type { Chunk, Document, Source, SourceRecord } from '../../schema';
import { sourceRecordIdFor } from '../ingestion/checksums';
import type { IngestionRunStatus } from '../ingestion/types';
import type { SearchFilters } from '../ingestion/validation';
import { matchesSearchFilters } from '../retrieval/filters';
import { cosineSimilarity } from '../retrieval/similarity';
import type {
  ChunkWrite,
  KnowledgeStore,
  ScoredChunk,
  SourceRecordUpsert,
  SourceUpsert,
} from './types';

function recordKey(sourceId: string, externalId: string): string {
  return `${sourceId}\u0000${externalId}`;
}

/**
 * In-process store with the same cascade and uniqueness rules as the SQL schema.
 * Used by tests and for local runs without a database.
 */
export class MemoryKnowledgeStore implements KnowledgeStore {
  private readonly sources = new Map<string, Source>();
  private readonly documents = new Map<string, Document>();
  private readonly chunks = new Map<string, Chunk>();
  private readonly records = new Map<string, SourceRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsertSource(input: SourceUpsert): Promise<Source> {
    const timestamp = this.now();
    const existing = this.sources.get(input.id);
    const next: Source = existing
      ? {
          ...existing,
          name: input.name,
          kind: input.kind,
          canonical_url: input.canonical_url,
          ingestion_mode: input.ingestion_mode,
          is_active: input.is_active ?? existing.is_active,
          metadata: { ...input.metadata },
          updated_at: timestamp,
        }
      : {
          id: input.id,
          name: input.name,
          kind: input.kind,
          canonical_url: input.canonical_url,
          ingestion_mode: input.ingestion_mode,
          is_active: input.is_active ?? true,
          last_ingested_at: null,
          last_ingestion_status: null,
          last_error_message: null,
          doc_count: 0,
          metadata: { ...input.metadata },
          created_at: timestamp,
          updated_at: timestamp,
        };

    this.sources.set(next.id, next);
    return structuredClone(next);
  }

  async getSource(sourceId: string): Promise<Source | null> {
    const source = this.sources.get(sourceId);
    return source ? structuredClone(source) : null;
  }

  async listSources(options: { activeOnly?: boolean } = {}): Promise<Source[]> {
    return [...this.sources.values()]
      .filter((source) => !options.activeOnly || source.is_active)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((source) => structuredClone(source));
  }

  async findSourcesByUrl(url: string): Promise<Source[]> {
    return [...this.sources.values()]
      .filter((source) => source.canonical_url === url)
      .map((source) => structuredClone(source));
  }

  async setSourceActive(sourceId: string, isActive: boolean): Promise<Source | null> {
    const source = this.sources.get(sourceId);
    if (!source) {
      return null;
    }
    const next = { ...source, is_active: isActive, updated_at: this.now() };
    this.sources.set(sourceId, next);
    return structuredClone(next);
  }

  async deleteSources(sourceIds: string[]): Promise<number> {
    let deleted = 0;
    for (const sourceId of new Set(sourceIds)) {
      if (!this.sources.delete(sourceId)) {
        continue;
      }
      deleted += 1;
      for (const document of [...this.documents.values()]) {
        if (document.source_id === sourceId) {
          this.removeDocument(document.id);
        }
      }
    }
    return deleted;
  }

  async recordIngestionStatus(
    sourceId: string,
    status: IngestionRunStatus,
    error: string | null = null,
    at: Date = this.now()
  ): Promise<void> {
    const source = this.sources.get(sourceId);
    if (!source) {
      return;
    }
    this.sources.set(sourceId, {
      ...source,
      last_ingested_at: at,
      last_ingestion_status: status,
      last_error_message: error,
      updated_at: this.now(),
    });
  }

  async getDocument(documentId: string): Promise<Document | null> {
    const document = this.documents.get(documentId);
    return document ? structuredClone(document) : null;
  }

  async listDocumentsForSource(sourceId: string): Promise<Document[]> {
    return [...this.documents.values()]
      .filter((document) => document.source_id === sourceId)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((document) => structuredClone(document));
  }

  async saveDocument(document: Document, chunks: ChunkWrite[] | null): Promise<Document> {
    if (!this.sources.has(document.source_id)) {
      throw new Error(`Cannot save document ${document.id}: source ${document.source_id} does not exist`);
    }
    const foreignChunk = chunks?.find((chunk) => chunk.doc_id !== document.id);
    if (foreignChunk) {
      throw new Error(`Chunk ${foreignChunk.id} does not belong to document ${document.id}`);
    }

    const previous = this.documents.get(document.id);
    this.documents.set(document.id, structuredClone(document));

    if (chunks !== null) {
      this.removeChunksFor(document.id);
      const createdAt = this.now();
      for (const chunk of chunks) {
        this.chunks.set(chunk.id, { ...structuredClone(chunk), created_at: createdAt });
      }
    }

    this.refreshDocCount(document.source_id);
    if (previous && previous.source_id !== document.source_id) {
      this.refreshDocCount(previous.source_id);
    }
    return structuredClone(document);
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    const document = this.documents.get(documentId);
    if (!document) {
      return false;
    }
    this.removeDocument(documentId);
    this.refreshDocCount(document.source_id);
    return true;
  }

  async getChunksForDocument(documentId: string): Promise<Chunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.doc_id === documentId)
      .sort((a, b) => a.chunk_index - b.chunk_index)
      .map((chunk) => structuredClone(chunk));
  }

  async listTopics(): Promise<string[]> {
    const topics = new Set<string>();
    for (const document of this.documents.values()) {
      for (const topic of document.topics) {
        topics.add(topic);
      }
    }
    return [...topics].sort();
  }

  async searchChunks(queryVector: number[], filters: SearchFilters, limit: number): Promise<ScoredChunk[]> {
    const scored: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      if (!chunk.embedding) {
        continue;
      }
      const document = this.documents.get(chunk.doc_id);
      if (!document || !matchesSearchFilters(chunk, document, filters)) {
        continue;
      }
      scored.push({
        chunk: structuredClone(chunk),
        document: structuredClone(document),
        score: cosineSimilarity(queryVector, chunk.embedding),
      });
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async getSourceRecord(sourceId: string, externalId: string): Promise<SourceRecord | null> {
    const record = this.records.get(recordKey(sourceId, externalId));
    return record ? structuredClone(record) : null;
  }

  async listSourceRecords(sourceId: string): Promise<SourceRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.source === sourceId)
      .sort((a, b) => a.external_id.localeCompare(b.external_id))
      .map((record) => structuredClone(record));
  }

  async upsertSourceRecord(input: SourceRecordUpsert): Promise<SourceRecord> {
    if (input.doc_id && !this.documents.has(input.doc_id)) {
      throw new Error(`Cannot link source record to missing document ${input.doc_id}`);
    }

    const key = recordKey(input.source, input.external_id);
    const existing = this.records.get(key);
    const next: SourceRecord = existing
      ? {
          ...existing,
          status: input.status,
          last_fetched_at:
            input.last_fetched_at !== undefined ? input.last_fetched_at : existing.last_fetched_at,
          doc_id: input.doc_id !== undefined ? input.doc_id : existing.doc_id,
          error_message:
            input.error_message !== undefined ? input.error_message : existing.error_message,
        }
      : {
          id: sourceRecordIdFor(input.source, input.external_id),
          source: input.source,
          external_id: input.external_id,
          status: input.status,
          last_fetched_at: input.last_fetched_at ?? null,
          doc_id: input.doc_id ?? null,
          error_message: input.error_message ?? null,
        };

    this.records.set(key, next);
    return structuredClone(next);
  }

  private removeDocument(documentId: string): void {
    this.documents.delete(documentId);
    this.removeChunksFor(documentId);
    for (const [key, record] of this.records) {
      if (record.doc_id === documentId) {
        this.records.set(key, { ...record, doc_id: null });
      }
    }
  }

  private removeChunksFor(documentId: string): void {
    for (const [chunkId, chunk] of this.chunks) {
      if (chunk.doc_id === documentId) {
        this.chunks.delete(chunkId);
      }
    }
  }

  private refreshDocCount(sourceId: string): void {
    const source = this.sources.get(sourceId);
    if (!source) {
      return;
    }
    let count = 0;
    for (const document of this.documents.values()) {
      if (document.source_id === sourceId) {
        count += 1;
      }
    }
    this.sources.set(sourceId, { ...source, doc_count: count, updated_at: this.now() });
  }
}
