import { describe, expect, it } from 'vitest';
import { TextChunker, pageAt } from './chunker';
import { joinPages } from './document-loader';
import type { SourceDocument } from '../types';

describe('TextChunker', () => {
  it('keeps short text in a single chunk', () => {
    const chunker = new TextChunker({ chunkSize: 100, chunkOverlap: 10 });
    expect(chunker.chunkText('Hello world.')).toEqual(['Hello world.']);
  });

  it('splits on paragraphs before anything smaller', () => {
    const chunker = new TextChunker({ chunkSize: 40, chunkOverlap: 0 });
    const text = `${'a'.repeat(30)}\n\n${'b'.repeat(30)}`;
    expect(chunker.chunkText(text)).toEqual(['a'.repeat(30), 'b'.repeat(30)]);
  });

  it('overlaps consecutive chunks by whole words', () => {
    const chunker = new TextChunker({ chunkSize: 20, chunkOverlap: 10 });
    expect(chunker.chunkText('one two three four five six seven eight')).toEqual([
      'one two three four',
      'three four five six',
      'five six seven eight'
    ]);
  });

  it('never exceeds the chunk size', () => {
    const chunker = new TextChunker({ chunkSize: 50, chunkOverlap: 10 });
    const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(' ');
    const chunks = chunker.chunkText(text);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks[0].startsWith('word0 ')).toBe(true);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(50);
    }
    expect(chunks.join(' ')).toContain('word199');
  });

  it('drops whitespace-only text', () => {
    const chunker = new TextChunker({ chunkSize: 20, chunkOverlap: 5 });
    expect(chunker.chunkText('   ')).toEqual([]);
  });

  it('locates every chunk in the source text', () => {
    const chunker = new TextChunker({ chunkSize: 20, chunkOverlap: 10 });
    const spans = chunker.chunkWithSpans('one two three four five six seven eight');
    expect(spans.map(({ start, end }) => [start, end])).toEqual([
      [0, 18],
      [8, 27],
      [19, 39]
    ]);
  });

  it('places repeated text at its own position, not an earlier copy', () => {
    const chunker = new TextChunker({ chunkSize: 8, chunkOverlap: 0 });
    const text = 'x alpha\n\nalpha';

    expect(chunker.chunkWithSpans(text)).toEqual([
      { text: 'x alpha', start: 0, end: 7 },
      { text: 'alpha', start: 9, end: 14 }
    ]);

    const document: SourceDocument = { id: 'a.pdf', kind: 'pdf', collection: 'docs', text, pageOffsets: [0, 9] };
    expect(chunker.chunkDocument(document, 'kb_00000000').map((chunk) => chunk.metadata.page)).toEqual([1, 2]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new TextChunker({ chunkSize: 10, chunkOverlap: 10 })).toThrow('Invalid chunk settings');
  });

  describe('chunkDocument', () => {
    const chunker = new TextChunker({ chunkSize: 40, chunkOverlap: 0 });

    it('attributes each chunk to the page it starts on', () => {
      const { text, pageOffsets } = joinPages(['First page text.', 'Second page text.']);
      const document: SourceDocument = { id: 'guide.pdf', kind: 'pdf', collection: 'docs', text, pageOffsets };

      const chunks = chunker.chunkDocument(document, 'kb_00000000');

      expect(chunks.map((chunk) => chunk.content)).toEqual([
        '--- Page 1 ---\n\nFirst page text.',
        '--- Page 2 ---\n\nSecond page text.'
      ]);
      expect(chunks.map((chunk) => chunk.metadata)).toEqual([
        { source: 'guide.pdf', kind: 'pdf', collection: 'docs', chunkIndex: 0, start: 0, end: 32, page: 1 },
        { source: 'guide.pdf', kind: 'pdf', collection: 'docs', chunkIndex: 1, start: 34, end: 67, page: 2 }
      ]);
    });

    it('copies table metadata onto every chunk', () => {
      const document: SourceDocument = {
        id: 'report_table1_rates.csv',
        kind: 'tabular',
        collection: 'docs',
        text: 'Coin: BTC | Price: 100',
        description: 'rates',
        columns: ['Coin', 'Price'],
        page: 3
      };

      const [chunk] = chunker.chunkDocument(document, 'kb_00000000');

      expect(chunk.metadata).toEqual({
        source: 'report_table1_rates.csv',
        kind: 'tabular',
        collection: 'docs',
        chunkIndex: 0,
        start: 0,
        end: 22,
        page: 3,
        description: 'rates',
        columns: 'Coin, Price'
      });
    });

    it('derives the same ids on every run and different ids per index', () => {
      const document: SourceDocument = { id: 'a.pdf', kind: 'pdf', collection: 'docs', text: 'Some text here.' };

      const first = chunker.chunkDocument(document, 'kb_11111111');
      const second = chunker.chunkDocument(document, 'kb_11111111');
      const other = chunker.chunkDocument(document, 'kb_22222222');

      expect(first[0].id).toBe(second[0].id);
      expect(first[0].id).not.toBe(other[0].id);
      expect(first[0].id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });
  });
});

describe('pageAt', () => {
  it('maps offsets to 1-based pages', () => {
    expect(pageAt([0, 34], 0)).toBe(1);
    expect(pageAt([0, 34], 33)).toBe(1);
    expect(pageAt([0, 34], 34)).toBe(2);
    expect(pageAt([0, 34], 500)).toBe(2);
  });

  it('returns undefined before the first page', () => {
    expect(pageAt([], 5)).toBeUndefined();
    expect(pageAt([10], 5)).toBeUndefined();
  });
});
