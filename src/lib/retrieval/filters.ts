import { isDeepStrictEqual } from 'node:util';
import type { Chunk, Document } from '../../schema';
import type { SearchFilters } from '../ingestion/validation';

export function yearStart(year: number): Date {
  return new Date(Date.UTC(year, 0, 1, 0, 0, 0));
}

export function yearEnd(year: number): Date {
  return new Date(Date.UTC(year, 11, 31, 23, 59, 59));
}

function containsAll(values: readonly string[], required: readonly string[] | undefined): boolean {
  if (!required || required.length === 0) {
    return true;
  }
  return required.every((value) => values.includes(value));
}

/**
 * In-process equivalent of the SQL predicates the Postgres store builds for a search.
 */
export function matchesSearchFilters(chunk: Chunk, document: Document, filters: SearchFilters): boolean {
  if (!containsAll(chunk.topics, filters.topics)) {
    return false;
  }
  if (!containsAll(chunk.risk_areas, filters.riskAreas)) {
    return false;
  }
  if (filters.sources && filters.sources.length > 0 && !filters.sources.includes(document.source)) {
    return false;
  }

  if (filters.yearMin !== undefined || filters.yearMax !== undefined) {
    const published = document.published_at;
    if (!published) {
      return false;
    }
    if (filters.yearMin !== undefined && published < yearStart(filters.yearMin)) {
      return false;
    }
    if (filters.yearMax !== undefined && published > yearEnd(filters.yearMax)) {
      return false;
    }
  }

  return Object.entries(filters.metadata).every(([key, value]) =>
    isDeepStrictEqual(document.metadata[key], value)
  );
}
