import type { DocumentInput, SourceInput } from '../ingestion/validation';

export const ABSTRACT_LENGTH = 400;

export type DiscoveredItem = {
  externalId: string;
  /** Last modification time reported by the origin, when it has one. */
  updatedAt?: Date | null;
  metadata?: Record<string, unknown>;
};

/**
 * Fetched document before it is bound to a registry source. The pipeline fills
 * in `source_id` and `external_id` from the source and the discovered item.
 */
export type FetchedDocument = Omit<DocumentInput, 'source_id' | 'external_id' | 'id'>;

export interface SourceAdapter {
  id: string;
  registrySource: SourceInput & { id: string };
  /** Lists every item the origin currently offers; batching is left to the pipeline. */
  discover(): Promise<DiscoveredItem[]>;
  fetchDocument(item: DiscoveredItem): Promise<FetchedDocument>;
}
