import type { Chunk, Document } from '../../schema';
import { getEmbeddingProvider, getMaxCandidateChunks } from '../env';
import { createEmbeddingGenerator, type EmbeddingGenerator } from '../ingestion/adapters/embedding-generator';
import { truncateText } from '../ingestion/text-cleaning';
import { parseSearchFilters, type SearchFiltersInput } from '../ingestion/validation';
import type { KnowledgeStore } from '../store/types';

export const SNIPPET_LENGTH = 400;
export const DEFAULT_RESULT_LIMIT = 10;

export type RetrievalContext = {
  store: KnowledgeStore;
  embeddingGenerator: EmbeddingGenerator;
  maxCandidateChunks: number;
};

export type SearchResult = {
  docId: string;
  chunkId: string;
  chunkIndex: number;
  title: string;
  url: string | null;
  snippet: string;
  score: number;
  source: string;
  topics: string[];
  riskAreas: string[];
  metadata: Record<string, unknown>;
};

export type SearchOptions = {
  k?: number;
  filters?: SearchFiltersInput;
};

export function createRetrievalContext(
  store: KnowledgeStore,
  overrides: Partial<Omit<RetrievalContext, 'store'>> = {}
): RetrievalContext {
  return {
    store,
    embeddingGenerator: overrides.embeddingGenerator ?? createEmbeddingGenerator(getEmbeddingProvider()),
    maxCandidateChunks: overrides.maxCandidateChunks ?? getMaxCandidateChunks(),
  };
}

/**
 * Embeds the query and ranks the nearest chunks by cosine similarity.
 * Chunks with a non-positive score are dropped.
 */
export async function search(
  ctx: RetrievalContext,
  query: string,
  options: SearchOptions = {}
): Promise<SearchResult[]> {
  const k = options.k ?? DEFAULT_RESULT_LIMIT;
  if (!Number.isInteger(k) || k <= 0) {
    throw new Error(`Result limit must be a positive integer, got ${k}`);
  }
  const filters = parseSearchFilters(options.filters);

  const startedMs = Date.now();
  const embedding = await ctx.embeddingGenerator.embed(query);
  const candidates = await ctx.store.searchChunks(
    embedding.vector,
    filters,
    Math.max(ctx.maxCandidateChunks, k)
  );

  const results = candidates
    .filter((candidate) => candidate.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, k)
    .map(({ chunk, document, score }) => ({
      docId: document.id,
      chunkId: chunk.id,
      chunkIndex: chunk.chunk_index,
      title: document.title,
      url: document.url,
      snippet: truncateText(chunk.text, SNIPPET_LENGTH),
      score,
      source: document.source,
      topics: document.topics,
      riskAreas: document.risk_areas,
      metadata: document.metadata,
    }));

  console.log(
    `[retrieval][timing] phase=search candidates=${candidates.length} results=${results.length} durationMs=${Date.now() - startedMs}`
  );
  return results;
}

export async function searchByTopic(
  ctx: RetrievalContext,
  topic: string,
  options: { query?: string; k?: number } = {}
): Promise<SearchResult[]> {
  const query = options.query?.trim() || `Authoritative documents about ${topic}`;
  return search(ctx, query, { k: options.k, filters: { topics: [topic] } });
}

export async function getDocument(ctx: Pick<RetrievalContext, 'store'>, documentId: string): Promise<Document | null> {
  return ctx.store.getDocument(documentId);
}

export async function getChunksForDocument(
  ctx: Pick<RetrievalContext, 'store'>,
  documentId: string
): Promise<Chunk[]> {
  return ctx.store.getChunksForDocument(documentId);
}

export async function listTopics(ctx: Pick<RetrievalContext, 'store'>): Promise<string[]> {
  return ctx.store.listTopics();
}
