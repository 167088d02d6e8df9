import type { Chunk, Document } from '../../schema';
import { cleanText } from './text-cleaning';

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

/**
 * Splits text into overlapping windows of `chunkSize` words. Windows advance by
 * `chunkSize - chunkOverlap` words (at least one) and stop at the first window
 * that reaches the end of the text.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkingOptions): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return [];
  }

  const step = Math.max(chunkSize - chunkOverlap, 1);
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + chunkSize, words.length);
    chunks.push(words.slice(start, end).join(' '));
    if (end === words.length) {
      break;
    }
  }
  return chunks;
}

export type ChunkSourceDocument = Pick<
  Document,
  'id' | 'source' | 'text' | 'topics' | 'risk_areas' | 'metadata'
>;

export type ChunkDraft = Omit<Chunk, 'embedding' | 'created_at'>;

export function buildChunks(document: ChunkSourceDocument, options: ChunkingOptions): ChunkDraft[] {
  const normalized = cleanText(document.text);
  if (!normalized) {
    return [];
  }

  return chunkText(normalized, options).map((body, index) => ({
    id: `${document.id}_${index}`,
    doc_id: document.id,
    chunk_index: index,
    text: body,
    topics: [...document.topics],
    risk_areas: [...document.risk_areas],
    metadata: { source: document.source, ...document.metadata },
  }));
}
