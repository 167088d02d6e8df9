export * from './schema';
export { getDatabase, closeDatabase, testDatabaseConnection, type Database } from './lib/db';
export { runMigrations, loadMigrations, splitStatements, DEFAULT_MIGRATIONS_DIR } from './lib/migrate';
export { validateKnowledgeBaseEnv } from './lib/env';

export type { KnowledgeStore, ScoredChunk, SourceRecordUpsert, SourceUpsert } from './lib/store/types';
export { MemoryKnowledgeStore } from './lib/store/memory-store';
export { PostgresKnowledgeStore, createPostgresKnowledgeStore } from './lib/store/postgres-store';

export {
  createIngestionContext,
  ingestDocument,
  ingestDocuments,
  ingestSource,
  type IngestionContext,
} from './lib/ingestion/pipeline';
export { chunkText, buildChunks } from './lib/ingestion/chunking';
export { cleanText } from './lib/ingestion/text-cleaning';
export { documentIdFor, sourceIdFor } from './lib/ingestion/checksums';
export {
  createEmbeddingGenerator,
  type EmbeddingGenerator,
} from './lib/ingestion/adapters/embedding-generator';
export type {
  DocumentInput,
  SearchFiltersInput,
  SourceInput,
} from './lib/ingestion/validation';
export type {
  DocumentIngestResult,
  IngestionMode,
  SourceIngestResult,
} from './lib/ingestion/types';

export {
  registerSource,
  activateSource,
  deactivateSource,
  removeSources,
  findSourcesByUrl,
  listDueSources,
} from './lib/source-registry';
export { runIngestionCycle } from './lib/scheduler';

export type { DiscoveredItem, FetchedDocument, SourceAdapter } from './lib/sources/base';
export { LocalFileSource } from './lib/sources/local-files';
export { WebPageSource } from './lib/sources/web-page';
export { createSourceAdapter } from './lib/sources/factory';

export {
  createRetrievalContext,
  search,
  searchByTopic,
  getDocument,
  getChunksForDocument,
  listTopics,
  type RetrievalContext,
  type SearchResult,
} from './lib/retrieval/search';
