import type { Document, Source, SourceRecord } from '../../schema';
import {
  getChunkOverlap,
  getChunkSize,
  getEmbeddingProvider,
  getFetchBatchSize,
} from '../env';
import type { DiscoveredItem, SourceAdapter } from '../sources/base';
import type { ChunkWrite, KnowledgeStore } from '../store/types';
import { createEmbeddingGenerator, type EmbeddingGenerator } from './adapters/embedding-generator';
import { documentIdFor, sha256Text } from './checksums';
import { buildChunks, type ChunkDraft } from './chunking';
import { cleanText } from './text-cleaning';
import type {
  DocumentIngestResult,
  IngestionMode,
  IngestionRunStatus,
  ItemIngestError,
  SourceIngestResult,
} from './types';
import { parseDocumentInput, parseSourceInput, type DocumentInput } from './validation';

export type IngestionContext = {
  store: KnowledgeStore;
  embeddingGenerator: EmbeddingGenerator;
  chunkSize: number;
  chunkOverlap: number;
  fetchBatchSize: number;
  now: () => Date;
};

export function createIngestionContext(
  store: KnowledgeStore,
  overrides: Partial<Omit<IngestionContext, 'store'>> = {}
): IngestionContext {
  return {
    store,
    embeddingGenerator: overrides.embeddingGenerator ?? createEmbeddingGenerator(getEmbeddingProvider()),
    chunkSize: overrides.chunkSize ?? getChunkSize(),
    chunkOverlap: overrides.chunkOverlap ?? getChunkOverlap(),
    fetchBatchSize: overrides.fetchBatchSize ?? getFetchBatchSize(),
    now: overrides.now ?? (() => new Date()),
  };
}

function asIsoTimestamp(value: number): string {
  return new Date(value).toISOString();
}

async function embedChunks(
  generator: EmbeddingGenerator,
  drafts: ChunkDraft[],
  documentId: string
): Promise<ChunkWrite[]> {
  const startedMs = Date.now();
  const rows: ChunkWrite[] = [];

  for (const draft of drafts) {
    const embedding = await generator.embed(draft.text);
    if (embedding.vector.length !== generator.dimensions) {
      throw new Error(
        `Embedding for chunk ${draft.id} has ${embedding.vector.length} dimensions, expected ${generator.dimensions}`
      );
    }
    rows.push({ ...draft, embedding: embedding.vector });
  }

  const endedMs = Date.now();
  const durationMs = endedMs - startedMs;
  console.log(
    `[ingestion][timing] phase=embeddings documentId=${documentId} provider=${generator.id} chunks=${rows.length} startedAt=${asIsoTimestamp(startedMs)} endedAt=${asIsoTimestamp(endedMs)} durationMs=${durationMs} durationSec=${(durationMs / 1000).toFixed(3)}`
  );
  return rows;
}

/**
 * Cleans, checksums and stores one document. A document whose checksum
 * matches the stored one is left untouched; a changed one gets the next
 * version and a rebuilt chunk set.
 */
export async function ingestDocument(
  ctx: IngestionContext,
  input: DocumentInput
): Promise<DocumentIngestResult> {
  const parsed = parseDocumentInput(input);
  const documentId =
    parsed.id ?? (parsed.external_id ? documentIdFor(parsed.source_id, parsed.external_id) : null);
  if (!documentId) {
    throw new Error('Invalid document: id: Either id or external_id is required');
  }

  const text = cleanText(parsed.text);
  if (!text) {
    console.warn(`[ingestion] Skipping document ${documentId}: no text after cleaning`);
    return { documentId, outcome: 'empty', version: null, chunkCount: 0 };
  }

  const checksum = parsed.checksum ?? sha256Text(text);
  const existing = await ctx.store.getDocument(documentId);

  if (existing && existing.checksum === checksum) {
    const storedChunks = await ctx.store.getChunksForDocument(documentId);
    return {
      documentId,
      outcome: 'unchanged',
      version: existing.version,
      chunkCount: storedChunks.length,
    };
  }

  const document: Document = {
    id: documentId,
    external_id: parsed.external_id ?? null,
    source: parsed.source,
    source_id: parsed.source_id,
    title: parsed.title,
    url: parsed.url ?? null,
    authors: parsed.authors,
    published_at: parsed.published_at ?? null,
    added_at: existing?.added_at ?? parsed.added_at ?? ctx.now(),
    abstract: parsed.abstract ?? null,
    text,
    raw_uri: parsed.raw_uri ?? null,
    checksum,
    topics: parsed.topics,
    risk_areas: parsed.risk_areas,
    tags: parsed.tags,
    metadata: parsed.metadata,
    version: existing ? existing.version + 1 : (parsed.version ?? 1),
  };

  const drafts = buildChunks(document, { chunkSize: ctx.chunkSize, chunkOverlap: ctx.chunkOverlap });
  const chunkRows = await embedChunks(ctx.embeddingGenerator, drafts, documentId);
  await ctx.store.saveDocument(document, chunkRows);

  console.log(
    `[ingestion] ${existing ? 'Updated' : 'Created'} document ${documentId} version=${document.version} chunks=${chunkRows.length}`
  );
  return {
    documentId,
    outcome: existing ? 'updated' : 'created',
    version: document.version,
    chunkCount: chunkRows.length,
  };
}

/**
 * Ingests documents one after another. Returns how many were stored or
 * already current; documents without text are not counted.
 */
export async function ingestDocuments(ctx: IngestionContext, inputs: DocumentInput[]): Promise<number> {
  let count = 0;
  for (const input of inputs) {
    const result = await ingestDocument(ctx, input);
    if (result.outcome !== 'empty') {
      count += 1;
    }
  }
  return count;
}

export function isItemCurrent(
  record: SourceRecord | null,
  mode: IngestionMode,
  item: DiscoveredItem
): boolean {
  if (!record || record.status !== 'fetched' || record.doc_id === null) {
    return false;
  }
  if (mode === 'snapshot') {
    return true;
  }
  if (!item.updatedAt || !record.last_fetched_at) {
    return false;
  }
  return item.updatedAt.getTime() <= record.last_fetched_at.getTime();
}

function emptyResult(sourceId: string): SourceIngestResult {
  return {
    sourceId,
    status: 'success',
    discovered: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
    deferred: 0,
    errors: [],
  };
}

function finalStatus(result: SourceIngestResult): IngestionRunStatus {
  if (result.errors.length > 0) {
    return 'failed';
  }
  return result.deferred > 0 ? 'pending' : 'success';
}

function summarizeRun(result: SourceIngestResult): string | null {
  if (result.errors.length === 0) {
    return result.deferred > 0 ? `${result.deferred} items deferred to the next run` : null;
  }
  return summarizeErrors(result);
}

function summarizeErrors(result: SourceIngestResult): string {
  const attempted = result.created + result.updated + result.unchanged + result.failed;
  const [first] = result.errors;
  const detail = first ? `; first error: ${first.externalId}: ${first.message}` : '';
  return `${result.failed} of ${attempted} items failed${detail}`;
}

async function ingestItem(
  ctx: IngestionContext,
  adapter: SourceAdapter,
  source: Source,
  item: DiscoveredItem
): Promise<DocumentIngestResult> {
  const fetched = await adapter.fetchDocument(item);
  const outcome = await ingestDocument(ctx, {
    ...fetched,
    source_id: source.id,
    external_id: item.externalId,
  });
  if (outcome.outcome === 'empty') {
    throw new Error('Fetched document has no text');
  }
  return outcome;
}

/**
 * Runs one ingestion pass for a source: registers it, discovers items, and
 * fetches up to `limit` items the ledger does not already show as current.
 * Items past the limit are deferred and the run is recorded as `pending`, so
 * the source stays due until its backlog is drained. Failures are recorded on
 * the ledger and on the source rather than thrown.
 */
export async function ingestSource(
  ctx: IngestionContext,
  adapter: SourceAdapter,
  options: { limit?: number } = {}
): Promise<SourceIngestResult> {
  const startedMs = Date.now();
  const runAt = ctx.now();
  const source = await ctx.store.upsertSource({
    ...parseSourceInput(adapter.registrySource),
    id: adapter.id,
  });
  const result = emptyResult(source.id);

  if (!source.is_active) {
    console.log(`[ingestion] Source ${source.id} is inactive; skipping`);
    return { ...result, status: 'skipped' };
  }

  let items: DiscoveredItem[];
  try {
    items = await adapter.discover();
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown discovery failure';
    console.error(`[ingestion] Discovery failed for source ${source.id}: ${message}`);
    await ctx.store.recordIngestionStatus(source.id, 'failed', `Discovery failed: ${message}`, runAt);
    return { ...result, status: 'failed', errors: [{ externalId: '*', message }] };
  }
  result.discovered = items.length;

  const limit = options.limit ?? ctx.fetchBatchSize;
  let attempted = 0;
  const errors: ItemIngestError[] = [];
  for (const item of items) {
    const record = await ctx.store.getSourceRecord(source.id, item.externalId);
    if (isItemCurrent(record, source.ingestion_mode, item)) {
      result.skipped += 1;
      continue;
    }
    if (attempted >= limit) {
      result.deferred += 1;
      continue;
    }
    attempted += 1;
    if (!record) {
      await ctx.store.upsertSourceRecord({
        source: source.id,
        external_id: item.externalId,
        status: 'new',
      });
    }

    const attemptedAt = ctx.now();
    try {
      const outcome = await ingestItem(ctx, adapter, source, item);
      await ctx.store.upsertSourceRecord({
        source: source.id,
        external_id: item.externalId,
        status: 'fetched',
        last_fetched_at: attemptedAt,
        doc_id: outcome.documentId,
        error_message: null,
      });
      if (outcome.outcome === 'created') {
        result.created += 1;
      } else if (outcome.outcome === 'updated') {
        result.updated += 1;
      } else {
        result.unchanged += 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown ingestion failure';
      console.error(`[ingestion] Item ${item.externalId} of source ${source.id} failed: ${message}`);
      await ctx.store.upsertSourceRecord({
        source: source.id,
        external_id: item.externalId,
        status: 'error',
        last_fetched_at: attemptedAt,
        error_message: message,
      });
      result.failed += 1;
      errors.push({ externalId: item.externalId, message });
    }
  }

  const finished: SourceIngestResult = { ...result, errors };
  finished.status = finalStatus(finished);
  await ctx.store.recordIngestionStatus(source.id, finished.status, summarizeRun(finished), runAt);

  const endedMs = Date.now();
  const durationMs = endedMs - startedMs;
  console.log(
    `[ingestion][timing] phase=source sourceId=${source.id} status=${finished.status} discovered=${finished.discovered} created=${finished.created} updated=${finished.updated} unchanged=${finished.unchanged} skipped=${finished.skipped} failed=${finished.failed} deferred=${finished.deferred} durationMs=${durationMs} durationSec=${(durationMs / 1000).toFixed(3)}`
  );
  return finished;
}
