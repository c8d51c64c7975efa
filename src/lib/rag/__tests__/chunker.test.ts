/**
 * Tests for the document chunker.
 */

import { describe, it, expect } from 'vitest';
import {
  chunkText,
  chunkDocument,
  chunkId,
  documentText,
  pageOffsets,
  pagesForSpan,
  estimateTokens,
  reconstructText,
} from '../chunker';
import { InvalidConfigError, InvalidInputError } from '../errors';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Deterministic prose-like text with paragraphs, sentences and clauses.
 */
function sampleText(words: number): string {
  const vocabulary = ['whale', 'sea', 'ship', 'captain', 'harpoon', 'storm', 'deck', 'night'];
  const parts: string[] = [];
  for (let i = 0; i < words; i++) {
    let word = vocabulary[(i * 7 + 3) % vocabulary.length] ?? 'word';
    if (i % 11 === 10) word += ',';
    if (i % 17 === 16) word += '.';
    parts.push(word);
    if (i % 53 === 52) parts.push('\n\n');
  }
  return parts.join(' ');
}

// =============================================================================
// chunkText
// =============================================================================

describe('chunkText', () => {
  it('should cut hard at the target when sentence preservation is off', () => {
    const chunks = [...chunkText('abcdefghij', {
      chunkSize: 4,
      chunkOverlap: 1,
      preserveSentences: false,
    })];

    expect(chunks.map(c => c.content)).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunks.map(c => c.span)).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
    ]);
    expect(chunks.map(c => c.sequenceIndex)).toEqual([0, 1, 2]);
  });

  it('should prefer sentence ends, then whitespace', () => {
    const chunks = [...chunkText('One two. Three four five six.', {
      chunkSize: 15,
      chunkOverlap: 0,
    })];

    expect(chunks.map(c => c.content)).toEqual(['One two. ', 'Three four ', 'five six.']);
  });

  it('should prefer a paragraph break over a later clause break', () => {
    const text = 'Alpha beta.\n\nGamma delta, epsilon zeta';
    const chunks = [...chunkText(text, { chunkSize: 30, chunkOverlap: 5 })];

    expect(chunks.map(c => c.span)).toEqual([
      { start: 0, end: 13 },
      { start: 8, end: 38 },
    ]);
    expect(chunks[0]?.content).toBe('Alpha beta.\n\n');
  });

  it('should return a single chunk for short text', () => {
    const chunks = [...chunkText('Short.', { chunkSize: 100, chunkOverlap: 10 })];

    expect(chunks).toEqual([{ content: 'Short.', sequenceIndex: 0, span: { start: 0, end: 6 } }]);
  });

  it('should keep text exactly as given', () => {
    const text = '  Leading   spaces\tand tabs  ';
    const chunks = [...chunkText(text, { chunkSize: 100, chunkOverlap: 0 })];

    expect(chunks[0]?.content).toBe(text);
  });

  it('should restart from the beginning on each iteration', () => {
    const chunks = chunkText(sampleText(200), { chunkSize: 120, chunkOverlap: 20 });

    const first = [...chunks];
    const second = [...chunks];

    expect(second).toEqual(first);
    expect(first.length).toBeGreaterThan(1);
  });

  it('should produce chunks lazily', () => {
    const iterator = chunkText(sampleText(5000), { chunkSize: 80, chunkOverlap: 10 })[Symbol.iterator]();

    const first = iterator.next();

    expect(first.done).toBe(false);
    expect(first.value?.sequenceIndex).toBe(0);
  });

  describe('invariants', () => {
    const text = sampleText(400);
    const settings = [
      { chunkSize: 50, chunkOverlap: 0 },
      { chunkSize: 50, chunkOverlap: 10 },
      { chunkSize: 120, chunkOverlap: 40 },
      { chunkSize: 200, chunkOverlap: 199 },
      { chunkSize: 600, chunkOverlap: 100 },
    ];

    for (const { chunkSize, chunkOverlap } of settings) {
      it(`should hold for size ${chunkSize}, overlap ${chunkOverlap}`, () => {
        const chunks = [...chunkText(text, { chunkSize, chunkOverlap })];

        expect(reconstructText(chunks, chunkOverlap)).toBe(text);
        expect(chunks[0]?.span.start).toBe(0);
        expect(chunks[chunks.length - 1]?.span.end).toBe(text.length);

        chunks.forEach((chunk, i) => {
          expect(chunk.content.length).toBeGreaterThan(0);
          expect(chunk.content.length).toBeLessThanOrEqual(chunkSize);
          expect(chunk.content).toBe(text.slice(chunk.span.start, chunk.span.end));
          const previous = chunks[i - 1];
          if (previous) {
            expect(chunk.span.start).toBe(previous.span.end - chunkOverlap);
          }
        });
      });
    }
  });

  describe('validation', () => {
    it('should reject overlap not smaller than chunk size', () => {
      expect(() => chunkText('text', { chunkSize: 10, chunkOverlap: 10 })).toThrow(InvalidConfigError);
      expect(() => chunkText('text', { chunkSize: 10, chunkOverlap: 11 })).toThrow(InvalidConfigError);
    });

    it('should reject invalid sizes', () => {
      expect(() => chunkText('text', { chunkSize: 0, chunkOverlap: 0 })).toThrow(InvalidConfigError);
      expect(() => chunkText('text', { chunkSize: 10.5, chunkOverlap: 0 })).toThrow(InvalidConfigError);
      expect(() => chunkText('text', { chunkSize: 10, chunkOverlap: -1 })).toThrow(InvalidConfigError);
      expect(() => chunkText('text', { boundaryWindow: -5 })).toThrow(InvalidConfigError);
    });

    it('should reject blank text when called, before iteration', () => {
      expect(() => chunkText('')).toThrow(InvalidConfigError);
      expect(() => chunkText(' \n\t ')).toThrow('Cannot chunk empty text');
    });
  });
});

// =============================================================================
// chunkDocument
// =============================================================================

describe('chunkDocument', () => {
  const book = {
    id: 'book',
    title: 'A Book',
    pages: ['aaaa bbbb', 'cccc dddd'],
  };

  it('should join pages and map chunks to page ranges', () => {
    const chunks = [...chunkDocument(book, { chunkSize: 12, chunkOverlap: 2 })];

    expect(chunks).toEqual([
      {
        id: 'book#000000',
        documentId: 'book',
        sequenceIndex: 0,
        content: 'aaaa bbbb\n\n',
        span: { start: 0, end: 11 },
        pages: { start: 1, end: 1 },
        previousId: null,
        nextId: 'book#000001',
      },
      {
        id: 'book#000001',
        documentId: 'book',
        sequenceIndex: 1,
        content: '\n\ncccc dddd',
        span: { start: 9, end: 20 },
        pages: { start: 1, end: 2 },
        previousId: 'book#000000',
        nextId: null,
      },
    ]);
  });

  it('should give a single chunk no neighbours', () => {
    const chunks = [...chunkDocument({ id: 'solo', title: 'Solo', pages: ['Just one page.'] })];

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.previousId).toBeNull();
    expect(chunks[0]?.nextId).toBeNull();
  });

  it('should link every chunk to its neighbours', () => {
    const pages = [sampleText(150), sampleText(90), sampleText(120)];
    const chunks = [...chunkDocument({ id: 'long', title: 'Long', pages }, { chunkSize: 100, chunkOverlap: 20 })];

    expect(reconstructText(chunks, 20)).toBe(documentText({ pages }));
    chunks.forEach((chunk, i) => {
      expect(chunk.id).toBe(chunkId('long', i));
      expect(chunk.previousId).toBe(i > 0 ? chunkId('long', i - 1) : null);
      expect(chunk.nextId).toBe(i < chunks.length - 1 ? chunkId('long', i + 1) : null);
      expect(chunk.pages.start).toBeLessThanOrEqual(chunk.pages.end);
    });
    expect(chunks[chunks.length - 1]?.pages.end).toBe(3);
  });

  it('should reject a document without id', () => {
    expect(() => chunkDocument({ id: ' ', title: 'x', pages: ['text'] })).toThrow(InvalidInputError);
  });

  it('should reject a document with only blank pages', () => {
    expect(() => chunkDocument({ id: 'blank', title: 'x', pages: ['', '  '] })).toThrow(InvalidConfigError);
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe('page helpers', () => {
  it('should compute page start offsets', () => {
    expect(pageOffsets(['abc', '', 'de'])).toEqual([0, 5, 7]);
  });

  it('should map spans to inclusive 1-based pages', () => {
    const offsets = pageOffsets(['abc', '', 'de']);

    expect(pagesForSpan(offsets, { start: 0, end: 3 })).toEqual({ start: 1, end: 1 });
    expect(pagesForSpan(offsets, { start: 2, end: 8 })).toEqual({ start: 1, end: 3 });
    expect(pagesForSpan(offsets, { start: 7, end: 9 })).toEqual({ start: 3, end: 3 });
  });
});

describe('estimateTokens', () => {
  it('should approximate four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('chunkId', () => {
  it('should pad the sequence to six digits', () => {
    expect(chunkId('moby-dick', 42)).toBe('moby-dick#000042');
  });
});
