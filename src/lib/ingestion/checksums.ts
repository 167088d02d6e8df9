import { createHash } from 'node:crypto';
import fs from 'fs-extra';

export function sha256Text(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

export async function sha256File(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  return createHash('sha256').update(buffer).digest('hex');
}

export function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'source';
}

/**
 * Stable document id for an external item, so re-ingesting the same item
 * updates one row instead of creating a new one per content revision.
 */
export function documentIdFor(sourceId: string, externalId: string): string {
  return `doc_${sha256Text(`${sourceId}:${externalId}`).slice(0, 24)}`;
}

export function sourceRecordIdFor(sourceId: string, externalId: string): string {
  return `rec_${sha256Text(`${sourceId}:${externalId}`).slice(0, 24)}`;
}

export function sourceIdFor(name: string): string {
  return `source_${slugify(name).replace(/-/g, '_')}`;
}
