import { sql } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import { describe, expect, it } from 'vitest';
import { buildSearchConditions } from '../postgres-store';

function render(filters: Parameters<typeof buildSearchConditions>[0]) {
  return new PgDialect().sqlToQuery(sql.join(buildSearchConditions(filters), sql.raw(' and ')));
}

describe('buildSearchConditions', () => {
  it('only requires an embedding when no filters are set', () => {
    const query = render({ metadata: {} });

    expect(query.sql).toBe('"chunks"."embedding" is not null');
    expect(query.params).toEqual([]);
  });

  it('turns label filters into jsonb containment and metadata into per-key equality', () => {
    const query = render({ topics: ['safety'], metadata: { lang: 'en' } });

    expect(query.sql).toBe(
      '"chunks"."embedding" is not null and "chunks"."topics" @> $1::jsonb and "documents"."metadata" -> $2::text = $3::jsonb'
    );
    expect(query.params).toEqual(['["safety"]', 'lang', '"en"']);
  });

  it('compares structured metadata values whole', () => {
    const query = render({ metadata: { tags: ['a'], reviewed: true } });

    expect(query.sql).toBe(
      '"chunks"."embedding" is not null and "documents"."metadata" -> $1::text = $2::jsonb and "documents"."metadata" -> $3::text = $4::jsonb'
    );
    expect(query.params).toEqual(['tags', '["a"]', 'reviewed', 'true']);
  });

  it('adds one condition per filter', () => {
    const conditions = buildSearchConditions({
      topics: ['safety'],
      riskAreas: ['bio'],
      sources: ['Agency'],
      yearMin: 2020,
      yearMax: 2024,
      metadata: { lang: 'en' },
    });

    expect(conditions).toHaveLength(7);
  });
});
