import { Readability, isProbablyReaderable } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { sourceIdFor } from '../ingestion/checksums';
import { elementText, normalizeWhitespace, truncateText } from '../ingestion/text-cleaning';
import type { IngestionMode } from '../ingestion/types';
import type { SourceInput } from '../ingestion/validation';
import { getSourceFetchTimeoutMs } from '../env';
import { ABSTRACT_LENGTH, type DiscoveredItem, type FetchedDocument, type SourceAdapter } from './base';

export type WebPageSourceOptions = {
  url: string;
  id?: string;
  name?: string;
  ingestionMode?: IngestionMode;
  metadata?: Record<string, unknown>;
  timeoutMs?: number;
};

const PUBLISHED_DATE_SELECTORS: Array<[selector: string, attribute: string]> = [
  ['meta[property="article:published_time"]', 'content'],
  ['meta[name="date"]', 'content'],
  ['time[datetime]', 'datetime'],
];

function titleOf(document: Document): string | null {
  return normalizeWhitespace(document.title) || null;
}

function publishedDateOf(document: Document): Date | null {
  for (const [selector, attribute] of PUBLISHED_DATE_SELECTORS) {
    const value = document.querySelector(selector)?.getAttribute(attribute);
    if (!value) {
      continue;
    }
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  return null;
}

export function extractTitle(html: string): string | null {
  return titleOf(new JSDOM(html).window.document);
}

export function extractPublishedDate(html: string): Date | null {
  return publishedDateOf(new JSDOM(html).window.document);
}

/**
 * Main text of a page. Article-like pages go through Readability; anything
 * else falls back to the whole body.
 */
export function extractPageText(html: string, url?: string): string {
  const options = url ? { url } : undefined;
  const { document } = new JSDOM(html, options).window;

  if (isProbablyReaderable(document)) {
    // Readability rewrites the tree it is given.
    const article = new Readability(new JSDOM(html, options).window.document).parse();
    const text = normalizeWhitespace(article?.textContent ?? '');
    if (text) {
      return text;
    }
  }
  return normalizeWhitespace(elementText(document.body));
}

/**
 * One web page per source. Every run refetches it and change detection is
 * left to the document checksum.
 */
export class WebPageSource implements SourceAdapter {
  readonly id: string;
  readonly registrySource: SourceInput & { id: string };
  private readonly url: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: WebPageSourceOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    const name = options.name ?? new URL(options.url).hostname;
    this.id = options.id ?? sourceIdFor(name);
    this.registrySource = {
      id: this.id,
      name,
      kind: 'website',
      canonical_url: options.url,
      ingestion_mode: options.ingestionMode ?? 'poll',
      metadata: options.metadata ?? {},
    };
  }

  async discover(): Promise<DiscoveredItem[]> {
    return [{ externalId: this.url }];
  }

  async fetchDocument(item: DiscoveredItem): Promise<FetchedDocument> {
    const timeoutMs = this.timeoutMs ?? getSourceFetchTimeoutMs();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let html: string;
    let contentType: string | null;
    try {
      const response = await fetch(item.externalId, {
        signal: controller.signal,
        headers: { Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8' },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      contentType = response.headers.get('content-type');
      html = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : 'Unknown fetch failure';
      throw new Error(`Fetching ${item.externalId} failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }

    const { document } = new JSDOM(html).window;
    const text = extractPageText(html, item.externalId);
    return {
      source: this.id,
      title: titleOf(document) ?? this.registrySource.name,
      url: item.externalId,
      published_at: publishedDateOf(document),
      abstract: truncateText(text, ABSTRACT_LENGTH) || null,
      text,
      raw_uri: item.externalId,
      metadata: { source_type: 'web_page', content_type: contentType },
    };
  }
}
