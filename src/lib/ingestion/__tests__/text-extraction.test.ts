import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { extractTextFromFile, isSupportedExtractionExtension } from '../text-extraction';

describe('text extraction helpers', () => {
  afterEach(() => {
    vi.clearAllMocks();
    vi.resetModules();
    vi.doUnmock('pdf-parse');
  });

  it('recognizes supported extraction extensions', () => {
    expect(isSupportedExtractionExtension('/tmp/a.txt')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.MD')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.htm')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.pdf')).toBe(true);
    expect(isSupportedExtractionExtension('/tmp/a.docx')).toBe(false);
    expect(isSupportedExtractionExtension('/tmp/a.xyz')).toBe(false);
  });

  it('extracts raw text from txt and html files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'kb-extract-'));
    await writeFile(join(dir, 'sample.txt'), 'hello from txt');
    await writeFile(join(dir, 'page.html'), '<p>hello from html</p>');

    expect(await extractTextFromFile(join(dir, 'sample.txt'))).toBe('hello from txt');
    expect(await extractTextFromFile(join(dir, 'page.html'))).toBe('<p>hello from html</p>');

    await rm(dir, { recursive: true, force: true });
  });

  it('reads pdf text through the pdf parser and releases it', async () => {
    const destroy = vi.fn(async () => undefined);
    vi.doMock('pdf-parse', () => ({
      PDFParse: class PDFParseMock {
        async getText() {
          return { text: 'text from pdf' };
        }
        destroy = destroy;
      },
    }));
    const { extractTextFromFile: extract } = await import('../text-extraction');

    const dir = await mkdtemp(join(tmpdir(), 'kb-extract-pdf-'));
    const filePath = join(dir, 'report.pdf');
    await writeFile(filePath, '%PDF-1.4 fixture');

    expect(await extract(filePath)).toBe('text from pdf');
    expect(destroy).toHaveBeenCalledTimes(1);

    await rm(dir, { recursive: true, force: true });
  });

  it('rejects unsupported extensions', async () => {
    await expect(extractTextFromFile('/tmp/a.docx')).rejects.toThrow(
      'Unsupported file extension for extraction: .docx'
    );
    await expect(extractTextFromFile('/tmp/README')).rejects.toThrow(
      'Unsupported file extension for extraction: none'
    );
  });
});
