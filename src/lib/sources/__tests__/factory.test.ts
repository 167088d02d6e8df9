import { describe, expect, it } from 'vitest';
import type { Source } from '../../../schema';
import { createSourceAdapter } from '../factory';
import { LocalFileSource } from '../local-files';
import { WebPageSource } from '../web-page';

function makeSource(overrides: Partial<Source>): Source {
  return {
    id: 'source_x',
    name: 'Source X',
    kind: 'website',
    canonical_url: 'https://example.org/x',
    ingestion_mode: 'poll',
    is_active: true,
    last_ingested_at: null,
    last_ingestion_status: null,
    last_error_message: null,
    doc_count: 0,
    metadata: { region: 'eu' },
    created_at: new Date('2024-01-01T00:00:00Z'),
    updated_at: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('createSourceAdapter', () => {
  it('builds a web page adapter that keeps the registry identity', () => {
    const adapter = createSourceAdapter(makeSource({ ingestion_mode: 'snapshot' }));

    expect(adapter).toBeInstanceOf(WebPageSource);
    expect(adapter.id).toBe('source_x');
    expect(adapter.registrySource).toEqual({
      id: 'source_x',
      name: 'Source X',
      kind: 'website',
      canonical_url: 'https://example.org/x',
      ingestion_mode: 'snapshot',
      metadata: { region: 'eu' },
    });
  });

  it('builds a local file adapter for file sources', () => {
    const adapter = createSourceAdapter(makeSource({ kind: 'file', canonical_url: '/srv/notes' }));

    expect(adapter).toBeInstanceOf(LocalFileSource);
    expect(adapter.registrySource.canonical_url).toBe('/srv/notes');
  });

  it('rejects kinds without an adapter', () => {
    expect(() => createSourceAdapter(makeSource({ kind: 'repo' }))).toThrow(
      'Unsupported source kind "repo" for source source_x'
    );
  });
});
