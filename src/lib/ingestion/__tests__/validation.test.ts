import { describe, expect, it } from 'vitest';
import { parseDocumentInput, parseSearchFilters, parseSourceInput } from '../validation';

describe('input validation', () => {
  it('applies source defaults without forcing the active flag', () => {
    const parsed = parseSourceInput({
      name: ' Agency ',
      kind: 'website',
      canonical_url: 'https://example.org',
      ingestion_mode: 'poll',
    });

    expect(parsed).toEqual({
      name: 'Agency',
      kind: 'website',
      canonical_url: 'https://example.org',
      ingestion_mode: 'poll',
      metadata: {},
    });
    expect(parsed.is_active).toBeUndefined();
  });

  it('reports the failing field in the error message', () => {
    expect(() =>
      parseSourceInput({ name: '   ', kind: 'website', canonical_url: 'https://example.org', ingestion_mode: 'poll' })
    ).toThrow('Invalid source: name: String must contain at least 1 character(s)');
  });

  it('requires an id or an external id for documents', () => {
    expect(() => parseDocumentInput({ source: 'Agency', source_id: 'source_agency', title: 'Untitled' })).toThrow(
      'Invalid document: id: Either id or external_id is required'
    );
  });

  it('coerces ISO dates and defaults label lists', () => {
    const added = new Date('2024-01-01T00:00:00Z');
    const parsed = parseDocumentInput({
      external_id: 'item-1',
      source: 'Agency',
      source_id: 'source_agency',
      title: 'Guidance',
      published_at: '2023-05-01T00:00:00Z',
      added_at: added,
    });

    expect(parsed.published_at?.getTime()).toBe(Date.UTC(2023, 4, 1));
    expect(parsed.added_at).toEqual(added);
    expect(parsed.topics).toEqual([]);
    expect(parsed.authors).toEqual([]);
    expect(parsed.metadata).toEqual({});
  });

  it('rejects dates that are not ISO timestamps', () => {
    expect(() =>
      parseDocumentInput({
        external_id: 'item-1',
        source: 'Agency',
        source_id: 'source_agency',
        title: 'Guidance',
        published_at: 'yesterday',
      })
    ).toThrow('Invalid document: published_at:');
  });

  it('treats missing search filters as no filters', () => {
    expect(parseSearchFilters(undefined)).toEqual({ metadata: {} });
    expect(parseSearchFilters({ topics: ['safety'], yearMin: 2020 })).toEqual({
      topics: ['safety'],
      yearMin: 2020,
      metadata: {},
    });
  });
});
