export const INGESTION_MODES = ['poll', 'snapshot', 'manual'] as const;

export type IngestionMode = (typeof INGESTION_MODES)[number];

export const INGESTION_RUN_STATUSES = ['pending', 'success', 'failed'] as const;

export type IngestionRunStatus = (typeof INGESTION_RUN_STATUSES)[number];

export const SOURCE_RECORD_STATUSES = ['new', 'fetched', 'error'] as const;

export type SourceRecordStatus = (typeof SOURCE_RECORD_STATUSES)[number];

export const EMBEDDING_DIMENSIONS = 1536;

export type EmbeddingResult = {
  model: string;
  dimensions: number;
  vector: number[];
};

export type DocumentIngestOutcome = 'created' | 'updated' | 'unchanged' | 'empty';

export type DocumentIngestResult = {
  documentId: string;
  outcome: DocumentIngestOutcome;
  version: number | null;
  chunkCount: number;
};

export type ItemIngestError = {
  externalId: string;
  message: string;
};

export type SourceIngestResult = {
  sourceId: string;
  status: IngestionRunStatus | 'skipped';
  discovered: number;
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
  /** Items past the batch limit, left for the next run. */
  deferred: number;
  errors: ItemIngestError[];
};
