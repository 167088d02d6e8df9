import type { Source } from '../schema';
import { sourceIdFor } from './ingestion/checksums';
import { parseSourceInput, type SourceInput } from './ingestion/validation';
import type { KnowledgeStore } from './store/types';

/**
 * Registers or updates a content origin. The id defaults to one derived from
 * the name, so registering the same name twice updates a single row.
 */
export async function registerSource(store: KnowledgeStore, input: SourceInput): Promise<Source> {
  const parsed = parseSourceInput(input);
  const source = await store.upsertSource({ ...parsed, id: parsed.id ?? sourceIdFor(parsed.name) });
  console.log(`[registry] Registered source ${source.id} kind=${source.kind} mode=${source.ingestion_mode}`);
  return source;
}

export async function activateSource(store: KnowledgeStore, sourceId: string): Promise<Source> {
  return setActive(store, sourceId, true);
}

export async function deactivateSource(store: KnowledgeStore, sourceId: string): Promise<Source> {
  return setActive(store, sourceId, false);
}

async function setActive(store: KnowledgeStore, sourceId: string, isActive: boolean): Promise<Source> {
  const source = await store.setSourceActive(sourceId, isActive);
  if (!source) {
    throw new Error(`Source ${sourceId} not found`);
  }
  return source;
}

/**
 * Deletes sources together with their documents and chunks. Ledger entries
 * stay behind with their document link cleared.
 */
export async function removeSources(store: KnowledgeStore, sourceIds: string[]): Promise<number> {
  const removed = await store.deleteSources(sourceIds);
  if (removed > 0) {
    console.log(`[registry] Removed ${removed} source(s)`);
  }
  return removed;
}

export async function findSourcesByUrl(store: KnowledgeStore, url: string): Promise<Source[]> {
  return store.findSourcesByUrl(url);
}

/**
 * A `pending` status means the last run left a backlog, so the source is due
 * again regardless of its poll interval.
 */
export function isSourceDue(source: Source, now: Date, pollIntervalMs: number): boolean {
  if (!source.is_active) {
    return false;
  }

  switch (source.ingestion_mode) {
    case 'poll':
      return (
        source.last_ingested_at === null ||
        source.last_ingestion_status === 'pending' ||
        now.getTime() - source.last_ingested_at.getTime() >= pollIntervalMs
      );
    case 'snapshot':
      return source.last_ingestion_status !== 'success';
    case 'manual':
      return false;
  }
}

export async function listDueSources(
  store: KnowledgeStore,
  now: Date,
  pollIntervalMs: number
): Promise<Source[]> {
  const sources = await store.listSources({ activeOnly: true });
  return sources.filter((source) => isSourceDue(source, now, pollIntervalMs));
}
