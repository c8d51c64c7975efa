/**
 * Tests for corpus ingestion.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CorpusIndexer,
  createConcurrencyLimiter,
  embedChunks,
} from '../ingestion';
import { chunkDocument } from '../chunker';
import { EmbeddingIndex } from '../embedding-index';
import { DimensionMismatchError, InvalidConfigError, InvalidInputError } from '../errors';
import type { Embedder, LLMEmbeddingResponse } from '@/types/llm';
import type { SourceDocument } from '@/types/corpus';

// =============================================================================
// Fixtures
// =============================================================================

const chunkOptions = { chunkSize: 12, chunkOverlap: 2 };

const book = (id: string, pages: string[]): SourceDocument => ({
  id,
  title: id.toUpperCase(),
  pages,
  source: `books/${id}.txt`,
});

const toResponse = (text: string): LLMEmbeddingResponse => ({
  embedding: [text.length, 1],
  usage: { promptTokens: 1, totalTokens: 1 },
});

function createEmbedder(impl?: (texts: string[]) => Promise<LLMEmbeddingResponse[]>) {
  const embedBatch = vi.fn(impl ?? (async (texts: string[]) => texts.map(toResponse)));
  const embedder: Embedder = { embed: vi.fn(), embedBatch };
  return { embedder, embedBatch };
}

const moby = book('moby', ['aaaa bbbb', 'cccc dddd']);
const walden = book('walden', ['Simplify, simplify.']);

// =============================================================================
// Concurrency Limiter
// =============================================================================

describe('createConcurrencyLimiter', () => {
  it('should never run more tasks than allowed at once', async () => {
    const limit = createConcurrencyLimiter(2);
    let active = 0;
    let maxActive = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map(n =>
        limit(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise(resolve => setTimeout(resolve, 5));
          active--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(maxActive).toBe(2);
  });

  it('should keep going after a task fails', async () => {
    const limit = createConcurrencyLimiter(1);

    const first = limit(() => Promise.reject(new Error('nope')));
    const second = limit(async () => 'ok');

    await expect(first).rejects.toThrow('nope');
    await expect(second).resolves.toBe('ok');
  });
});

// =============================================================================
// embedChunks
// =============================================================================

describe('embedChunks', () => {
  it('should embed in batches and keep chunk order', async () => {
    const { embedder, embedBatch } = createEmbedder();
    const chunks = [...chunkDocument(moby, chunkOptions)];

    const { vectors, tokens } = await embedChunks(embedder, chunks, {
      batchSize: 1,
      embeddingModel: 'test-embedding',
    });

    expect(embedBatch).toHaveBeenCalledTimes(chunks.length);
    expect(embedBatch).toHaveBeenNthCalledWith(1, [chunks[0]?.content], { model: 'test-embedding' });
    expect(vectors).toEqual(chunks.map(c => [c.content.length, 1]));
    expect(tokens).toBe(chunks.length);
  });

  it('should reject a vector count that differs from the chunk count', async () => {
    const { embedder } = createEmbedder(async () => [toResponse('only one')]);
    const chunks = [...chunkDocument(moby, chunkOptions)];

    await expect(embedChunks(embedder, chunks, { batchSize: 64 })).rejects.toThrow(
      `Embedding service returned 1 vectors for ${chunks.length} chunks`
    );
  });
});

// =============================================================================
// CorpusIndexer
// =============================================================================

describe('CorpusIndexer', () => {
  it('should index every book and report the corpus version', async () => {
    const index = new EmbeddingIndex();
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(index, embedder, chunkOptions);
    const mobyChunks = [...chunkDocument(moby, chunkOptions)].length;
    const waldenChunks = [...chunkDocument(walden, chunkOptions)].length;

    const report = await indexer.ingest([moby, walden]);

    expect(report.indexed.map(d => d.documentId)).toEqual(['moby', 'walden']);
    expect(report.indexed.map(d => d.chunks)).toEqual([mobyChunks, waldenChunks]);
    expect(report.failed).toEqual([]);
    expect(report.chunks).toBe(mobyChunks + waldenChunks);
    expect(report.totalChunks).toBe(index.size);
    expect(report.corpusVersion).toBe(index.corpusVersion);
    expect(index.getDocument('moby')).toEqual({
      id: 'moby',
      title: 'MOBY',
      source: 'books/moby.txt',
      pageCount: 2,
    });
  });

  it('should report a failing book and keep the others', async () => {
    const index = new EmbeddingIndex();
    const { embedder } = createEmbedder(async texts => {
      if (texts.some(t => t.includes('broken'))) {
        throw new Error('service exploded');
      }
      return texts.map(toResponse);
    });
    const indexer = new CorpusIndexer(index, embedder, chunkOptions);

    const report = await indexer.ingest([book('bad', ['broken']), walden]);

    expect(report.indexed.map(d => d.documentId)).toEqual(['walden']);
    expect(report.failed).toEqual([{ documentId: 'bad', error: 'service exploded', code: null }]);
    expect(index.hasDocument('bad')).toBe(false);
  });

  it('should report a book without text as invalid input', async () => {
    const { embedder, embedBatch } = createEmbedder();
    const indexer = new CorpusIndexer(new EmbeddingIndex(), embedder, chunkOptions);

    const report = await indexer.ingest([book('blank', ['   ', ''])]);

    expect(report.failed).toEqual([
      { documentId: 'blank', error: 'Document blank contains no text', code: 'INVALID_INPUT' },
    ]);
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it('should abort on a dimension mismatch', async () => {
    const index = new EmbeddingIndex({ dimension: 3 });
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(index, embedder, { ...chunkOptions, concurrency: 1 });

    await expect(indexer.ingest([moby, walden])).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(index.size).toBe(0);
  });

  it('should not merge books still in flight when the run aborts', async () => {
    const index = new EmbeddingIndex({ dimension: 2 });
    const { embedder } = createEmbedder(async (texts) => {
      if (texts.some(text => text.includes('wide'))) {
        return texts.map(() => ({ embedding: [1, 2, 3], usage: { promptTokens: 1, totalTokens: 1 } }));
      }
      await new Promise(resolve => setTimeout(resolve, 20));
      return texts.map(toResponse);
    });
    const indexer = new CorpusIndexer(index, embedder, { ...chunkOptions, concurrency: 2 });

    await expect(
      indexer.ingest([book('wide', ['wide vectors']), book('slow', ['slow book'])])
    ).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(index.size).toBe(0);

    await new Promise(resolve => setTimeout(resolve, 40));
    expect(index.size).toBe(0);
    expect(index.hasDocument('slow')).toBe(false);
  });

  it('should leave the index untouched when the signal is already aborted', async () => {
    const index = new EmbeddingIndex();
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(index, embedder, chunkOptions);
    const controller = new AbortController();
    controller.abort(new InvalidConfigError('stop'));

    await expect(indexer.ingestDocument(walden, controller.signal)).rejects.toThrow('stop');
    expect(index.size).toBe(0);
  });

  it('should replace the chunks of a re-ingested book', async () => {
    const index = new EmbeddingIndex();
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(index, embedder, chunkOptions);

    await indexer.ingest([moby]);
    const before = index.corpusVersion;
    await indexer.ingest([book('moby', ['A shorter text.'])]);

    expect(index.chunksOf('moby').map(c => c.content)).toEqual(
      [...chunkDocument(book('moby', ['A shorter text.']), chunkOptions)].map(c => c.content)
    );
    expect(index.corpusVersion).not.toBe(before);
  });

  it('should reject duplicate ids in one run', async () => {
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(new EmbeddingIndex(), embedder, chunkOptions);

    await expect(indexer.ingest([moby, moby])).rejects.toThrow('Duplicate document id moby');
  });

  it('should validate settings when created', () => {
    const { embedder } = createEmbedder();
    const index = new EmbeddingIndex();

    expect(() => new CorpusIndexer(index, embedder, { chunkSize: 10, chunkOverlap: 10 })).toThrow(
      InvalidConfigError
    );
    expect(() => new CorpusIndexer(index, embedder, { concurrency: 0 })).toThrow(InvalidConfigError);
    expect(() => new CorpusIndexer(index, embedder, { batchSize: 1.5 })).toThrow(InvalidConfigError);
  });

  it('should remove a book from the index', async () => {
    const index = new EmbeddingIndex();
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(index, embedder, chunkOptions);
    await indexer.ingest([moby, walden]);
    const mobyChunks = index.chunksOf('moby').length;

    expect(indexer.removeDocument('moby')).toBe(mobyChunks);
    expect(index.hasDocument('moby')).toBe(false);
    expect(index.documents().map(d => d.id)).toEqual(['walden']);
  });

  it('should surface invalid input from a single ingestDocument call', async () => {
    const { embedder } = createEmbedder();
    const indexer = new CorpusIndexer(new EmbeddingIndex(), embedder, chunkOptions);

    await expect(indexer.ingestDocument(book('blank', ['']))).rejects.toBeInstanceOf(InvalidInputError);
  });
});
