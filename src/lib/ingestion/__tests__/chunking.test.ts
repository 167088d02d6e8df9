import { describe, expect, it } from 'vitest';
import { buildChunks, chunkText } from '../chunking';

describe('chunkText', () => {
  it('slides a word window forward by size minus overlap', () => {
    expect(chunkText('a b c d e f g', { chunkSize: 3, chunkOverlap: 1 })).toEqual([
      'a b c',
      'c d e',
      'e f g',
    ]);
  });

  it('stops at the first window that reaches the end of the text', () => {
    expect(chunkText('a b c d e', { chunkSize: 4, chunkOverlap: 2 })).toEqual(['a b c d', 'c d e']);
  });

  it('returns one chunk for text shorter than the window', () => {
    expect(chunkText('only three words', { chunkSize: 512, chunkOverlap: 80 })).toEqual([
      'only three words',
    ]);
  });

  it('advances at least one word when the overlap is not smaller than the size', () => {
    expect(chunkText('a b c', { chunkSize: 2, chunkOverlap: 5 })).toEqual(['a b', 'b c']);
  });

  it('returns nothing for blank text', () => {
    expect(chunkText(' \n\t ', { chunkSize: 3, chunkOverlap: 1 })).toEqual([]);
  });
});

describe('buildChunks', () => {
  const document = {
    id: 'doc_1',
    source: 'Agency',
    text: '<p>Hello&amp; world</p> more',
    topics: ['safety'],
    risk_areas: ['bio'],
    metadata: { lang: 'en' },
  };

  it('builds ordered chunk rows from the cleaned document text', () => {
    const chunks = buildChunks(document, { chunkSize: 2, chunkOverlap: 0 });

    expect(chunks).toEqual([
      {
        id: 'doc_1_0',
        doc_id: 'doc_1',
        chunk_index: 0,
        text: 'Hello& world',
        topics: ['safety'],
        risk_areas: ['bio'],
        metadata: { source: 'Agency', lang: 'en' },
      },
      {
        id: 'doc_1_1',
        doc_id: 'doc_1',
        chunk_index: 1,
        text: 'more',
        topics: ['safety'],
        risk_areas: ['bio'],
        metadata: { source: 'Agency', lang: 'en' },
      },
    ]);
    expect(chunks[0].topics).not.toBe(document.topics);
  });

  it('returns no chunks for a document without text', () => {
    expect(buildChunks({ ...document, text: null }, { chunkSize: 2, chunkOverlap: 0 })).toEqual([]);
  });
});
