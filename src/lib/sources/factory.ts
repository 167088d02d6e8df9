import type { Source } from '../../schema';
import type { SourceAdapter } from './base';
import { LocalFileSource } from './local-files';
import { WebPageSource } from './web-page';

/**
 * Builds the adapter that ingests a registered source, keyed by its kind.
 */
export function createSourceAdapter(source: Source): SourceAdapter {
  const common = {
    id: source.id,
    name: source.name,
    ingestionMode: source.ingestion_mode,
    metadata: source.metadata,
  };

  if (source.kind === 'file') {
    return new LocalFileSource({ ...common, path: source.canonical_url });
  }

  if (source.kind === 'website') {
    return new WebPageSource({ ...common, url: source.canonical_url });
  }

  throw new Error(`Unsupported source kind "${source.kind}" for source ${source.id}`);
}
