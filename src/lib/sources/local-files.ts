import { basename, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import fs from 'fs-extra';
import { sha256File, sourceIdFor } from '../ingestion/checksums';
import { truncateText } from '../ingestion/text-cleaning';
import { extractTextFromFile, isSupportedExtractionExtension } from '../ingestion/text-extraction';
import type { IngestionMode } from '../ingestion/types';
import type { SourceInput } from '../ingestion/validation';
import { ABSTRACT_LENGTH, type DiscoveredItem, type FetchedDocument, type SourceAdapter } from './base';

export type LocalFileSourceOptions = {
  /** File or directory path, or a file:// URL. */
  path: string;
  id?: string;
  name?: string;
  ingestionMode?: IngestionMode;
  metadata?: Record<string, unknown>;
};

export function toLocalPath(location: string): string {
  return location.startsWith('file://') ? fileURLToPath(location) : resolve(location);
}

/**
 * Ingests a single file or the supported files directly inside a directory.
 * External ids are file names, so renaming a file creates a new document.
 */
export class LocalFileSource implements SourceAdapter {
  readonly id: string;
  readonly registrySource: SourceInput & { id: string };
  private readonly rootPath: string;

  constructor(options: LocalFileSourceOptions) {
    this.rootPath = toLocalPath(options.path);
    const name = options.name ?? basename(this.rootPath);
    this.id = options.id ?? sourceIdFor(`file ${name}`);
    this.registrySource = {
      id: this.id,
      name,
      kind: 'file',
      canonical_url: options.path,
      ingestion_mode: options.ingestionMode ?? 'poll',
      metadata: options.metadata ?? {},
    };
  }

  async discover(): Promise<DiscoveredItem[]> {
    const rootStats = await fs.stat(this.rootPath);

    if (rootStats.isFile()) {
      if (!isSupportedExtractionExtension(this.rootPath)) {
        throw new Error(`Unsupported file type: ${basename(this.rootPath)}`);
      }
      return [
        {
          externalId: basename(this.rootPath),
          updatedAt: rootStats.mtime,
          metadata: { size_bytes: rootStats.size },
        },
      ];
    }

    const items: DiscoveredItem[] = [];
    const names = (await fs.readdir(this.rootPath)).sort();
    for (const name of names) {
      if (!isSupportedExtractionExtension(name)) {
        continue;
      }
      const entryStats = await fs.stat(join(this.rootPath, name));
      if (!entryStats.isFile()) {
        continue;
      }
      items.push({
        externalId: name,
        updatedAt: entryStats.mtime,
        metadata: { size_bytes: entryStats.size },
      });
    }
    return items;
  }

  async fetchDocument(item: DiscoveredItem): Promise<FetchedDocument> {
    const filePath = await this.resolveItemPath(item.externalId);
    const text = await extractTextFromFile(filePath);
    const title = basename(item.externalId, extname(item.externalId));

    return {
      source: this.id,
      title,
      url: null,
      abstract: truncateText(text.trim(), ABSTRACT_LENGTH) || null,
      text,
      raw_uri: filePath,
      checksum: await sha256File(filePath),
      metadata: { local_path: filePath, ...(item.metadata ?? {}) },
    };
  }

  private async resolveItemPath(externalId: string): Promise<string> {
    const rootStats = await fs.stat(this.rootPath);
    if (rootStats.isFile()) {
      return this.rootPath;
    }
    if (basename(externalId) !== externalId) {
      throw new Error(`External id "${externalId}" is not a file name inside ${this.rootPath}`);
    }
    return join(this.rootPath, externalId);
  }
}
