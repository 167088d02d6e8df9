import { afterEach, describe, expect, it, vi } from 'vitest';
import { WebPageSource, extractPageText, extractPublishedDate, extractTitle } from '../web-page';

const PAGE = [
  '<html><head><title>Safety &amp; Policy</title>',
  '<meta property="article:published_time" content="2024-03-05T10:00:00Z">',
  '</head><body><script>var tracking = 1;</script><p>Hello   world</p></body></html>',
].join('');

describe('WebPageSource', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it('derives its registry entry from the page host', () => {
    const source = new WebPageSource({ url: 'https://example.org/page' });

    expect(source.id).toBe('source_example_org');
    expect(source.registrySource).toMatchObject({
      name: 'example.org',
      kind: 'website',
      canonical_url: 'https://example.org/page',
      ingestion_mode: 'poll',
    });
  });

  it('discovers the page itself', async () => {
    const source = new WebPageSource({ url: 'https://example.org/page' });

    expect(await source.discover()).toEqual([{ externalId: 'https://example.org/page' }]);
  });

  it('fetches and cleans the page', async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: 'OK',
      headers: new Headers({ 'content-type': 'text/html; charset=utf-8' }),
      text: async () => PAGE,
    });
    vi.stubGlobal('fetch', fetchMock);
    const source = new WebPageSource({ url: 'https://example.org/page' });

    const document = await source.fetchDocument({ externalId: 'https://example.org/page' });

    expect(fetchMock).toHaveBeenCalledWith('https://example.org/page', expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(document).toEqual({
      source: 'source_example_org',
      title: 'Safety & Policy',
      url: 'https://example.org/page',
      published_at: new Date('2024-03-05T10:00:00Z'),
      abstract: 'Hello world',
      text: 'Hello world',
      raw_uri: 'https://example.org/page',
      metadata: { source_type: 'web_page', content_type: 'text/html; charset=utf-8' },
    });
  });

  it('reports non-success responses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue({ ok: false, status: 503, statusText: 'Service Unavailable' })
    );
    const source = new WebPageSource({ url: 'https://example.org/page' });

    await expect(source.fetchDocument({ externalId: 'https://example.org/page' })).rejects.toThrow(
      'Fetching https://example.org/page failed: HTTP 503 Service Unavailable'
    );
  });

  it('aborts requests that exceed the timeout', async () => {
    vi.stubEnv('SOURCE_FETCH_TIMEOUT_MS', '20');
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
          })
      )
    );
    const source = new WebPageSource({ url: 'https://example.org/slow' });

    await expect(source.fetchDocument({ externalId: 'https://example.org/slow' })).rejects.toThrow(
      'Fetching https://example.org/slow failed: timed out after 20ms'
    );
  });
});

describe('page metadata helpers', () => {
  it('reads the title and falls back to null', () => {
    expect(extractTitle('<title>\n  Annual   Review </title>')).toBe('Annual Review');
    expect(extractTitle('<title>Q&amp;A &mdash; Guidance</title>')).toBe('Q&A — Guidance');
    expect(extractTitle('<p>no title</p>')).toBeNull();
  });

  it('ignores unparseable publication dates', () => {
    expect(extractPublishedDate('<time datetime="not a date"></time>')).toBeNull();
    expect(extractPublishedDate('<meta name="date" content="2020-02-02">')).toEqual(new Date('2020-02-02'));
  });
});

describe('extractPageText', () => {
  const paragraph = (topic: string) =>
    `<p>${`This paragraph explains how the ${topic} guidance applies to operators, inspectors and auditors alike. `.repeat(6)}</p>`;

  it('uses the article body of readable pages', () => {
    const html = [
      '<html><head><title>Guidance</title></head><body>',
      '<script>var tracking = 1;</script>',
      `<article>${paragraph('storage')}${paragraph('transport')}${paragraph('disposal')}</article>`,
      '</body></html>',
    ].join('\n');

    const text = extractPageText(html, 'https://example.org/guidance');

    expect(text).toContain('This paragraph explains how the transport guidance applies to operators, inspectors and auditors alike.');
    expect(text).not.toContain('tracking');
  });

  it('falls back to the body text of short pages', () => {
    const html = '<body><nav>Home</nav><p>Notice &ndash; site closed</p><style>p { color: red }</style></body>';

    expect(extractPageText(html)).toBe('Home Notice – site closed');
  });
});
