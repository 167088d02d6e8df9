import type { DiscoveredItem, FetchedDocument, SourceAdapter } from '../sources/base';
import type { IngestionMode } from '../ingestion/types';
import type { SourceInput } from '../ingestion/validation';

type FakeItem = {
  externalId: string;
  updatedAt?: Date;
  document: FetchedDocument | Error;
};

/**
 * Scripted adapter for pipeline and scheduler tests. Items and their
 * documents can be swapped between runs.
 */
export class FakeSourceAdapter implements SourceAdapter {
  readonly id: string;
  readonly registrySource: SourceInput & { id: string };
  items: FakeItem[] = [];
  discoverError: Error | null = null;
  discoverCalls = 0;
  readonly fetchCalls: string[] = [];

  constructor(options: { id: string; name?: string; mode?: IngestionMode; isActive?: boolean }) {
    this.id = options.id;
    this.registrySource = {
      id: options.id,
      name: options.name ?? options.id,
      kind: 'fake',
      canonical_url: `fake://${options.id}`,
      ingestion_mode: options.mode ?? 'poll',
      ...(options.isActive !== undefined ? { is_active: options.isActive } : {}),
    };
  }

  async discover(): Promise<DiscoveredItem[]> {
    this.discoverCalls += 1;
    if (this.discoverError) {
      throw this.discoverError;
    }
    return this.items.map((item) => ({ externalId: item.externalId, updatedAt: item.updatedAt ?? null }));
  }

  async fetchDocument(item: DiscoveredItem): Promise<FetchedDocument> {
    this.fetchCalls.push(item.externalId);
    const match = this.items.find((candidate) => candidate.externalId === item.externalId);
    if (!match) {
      throw new Error(`Unknown item ${item.externalId}`);
    }
    if (match.document instanceof Error) {
      throw match.document;
    }
    return match.document;
  }
}

export function fakeDocument(title: string, text: string): FetchedDocument {
  return { source: 'Fake Agency', title, text, topics: ['safety'] };
}
