import { z } from 'zod';
import { INGESTION_MODES } from './types';

const dateInput = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform((value) => (value instanceof Date ? value : new Date(value)));

const labelList = z.array(z.string().trim().min(1)).default([]);

export const sourceInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  kind: z.string().trim().min(1),
  canonical_url: z.string().trim().min(1),
  ingestion_mode: z.enum(INGESTION_MODES),
  is_active: z.boolean().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type SourceInput = z.input<typeof sourceInputSchema>;
export type ParsedSourceInput = z.output<typeof sourceInputSchema>;

export const documentInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    external_id: z.string().min(1).nullable().optional(),
    source: z.string().trim().min(1),
    source_id: z.string().min(1),
    title: z.string().trim().min(1),
    url: z.string().nullable().optional(),
    authors: labelList,
    published_at: dateInput.nullable().optional(),
    added_at: dateInput.optional(),
    abstract: z.string().nullable().optional(),
    text: z.string().nullable().optional(),
    raw_uri: z.string().nullable().optional(),
    checksum: z.string().min(1).nullable().optional(),
    topics: labelList,
    risk_areas: labelList,
    tags: labelList,
    metadata: z.record(z.unknown()).default({}),
    version: z.number().int().positive().optional(),
  })
  .refine((value) => Boolean(value.id || value.external_id), {
    message: 'Either id or external_id is required',
    path: ['id'],
  });

export type DocumentInput = z.input<typeof documentInputSchema>;
export type ParsedDocumentInput = z.output<typeof documentInputSchema>;

export const searchFiltersSchema = z.object({
  topics: z.array(z.string()).optional(),
  sources: z.array(z.string()).optional(),
  riskAreas: z.array(z.string()).optional(),
  yearMin: z.number().int().optional(),
  yearMax: z.number().int().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type SearchFiltersInput = z.input<typeof searchFiltersSchema>;
export type SearchFilters = z.output<typeof searchFiltersSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseSourceInput(value: SourceInput): ParsedSourceInput {
  return parseWith(sourceInputSchema, value, 'source');
}

export function parseDocumentInput(value: DocumentInput): ParsedDocumentInput {
  return parseWith(documentInputSchema, value, 'document');
}

export function parseSearchFilters(value: SearchFiltersInput | undefined): SearchFilters {
  return parseWith(searchFiltersSchema, value ?? {}, 'search filters');
}
