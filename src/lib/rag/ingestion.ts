/**
 * Corpus Ingestion
 *
 * Chunks and embeds books in parallel, then merges each finished book into
 * the embedding index with a single replaceDocument() call. Merges happen
 * on the event loop between awaits, so they are serialized by construction.
 */

import type { Chunk, SourceDocument } from '@/types/corpus';
import type { Embedder } from '@/types/llm';
import {
  createLayerLogger,
  errorMessage,
  logExternalCall,
  logRagStep,
  Timer,
  type Logger,
} from '@/lib/logger';
import { chunkDocument, documentText, resolveChunkOptions, type ChunkOptions } from './chunker';
import type { EmbeddingIndex } from './embedding-index';
import {
  DEFAULT_EMBEDDING_BATCH_SIZE,
  DEFAULT_INGEST_CONCURRENCY,
} from './config';
import {
  DimensionMismatchError,
  InvalidConfigError,
  InvalidInputError,
  isRAGError,
  type RAGErrorCode,
} from './errors';

// =============================================================================
// Concurrency Limiter
// =============================================================================

/**
 * Run async tasks with at most `maxConcurrent` in flight.
 */
export function createConcurrencyLimiter(maxConcurrent: number) {
  let activeCount = 0;
  const queue: Array<() => Promise<void>> = [];

  const runNext = () => {
    if (queue.length > 0 && activeCount < maxConcurrent) {
      activeCount++;
      const next = queue.shift();
      if (next) void next();
    }
  };

  return <T>(fn: () => Promise<T>): Promise<T> => {
    return new Promise((resolve, reject) => {
      const run = async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        } finally {
          activeCount--;
          runNext();
        }
      };

      if (activeCount < maxConcurrent) {
        activeCount++;
        void run();
      } else {
        queue.push(run);
      }
    });
  };
}

// =============================================================================
// Types
// =============================================================================

export interface IngestionOptions extends ChunkOptions {
  batchSize: number;
  concurrency: number;
  embeddingModel?: string;
}

export interface IngestedDocument {
  documentId: string;
  title: string;
  chunks: number;
  tokens: number;
  duration_ms: number;
}

export interface FailedDocument {
  documentId: string;
  error: string;
  code: RAGErrorCode | null;
}

export interface IngestionReport {
  indexed: IngestedDocument[];
  failed: FailedDocument[];
  chunks: number;
  totalChunks: number;
  corpusVersion: string;
  duration_ms: number;
}

const DEFAULT_INGESTION_OPTIONS = {
  batchSize: DEFAULT_EMBEDDING_BATCH_SIZE,
  concurrency: DEFAULT_INGEST_CONCURRENCY,
};

// =============================================================================
// Embedding
// =============================================================================

/**
 * Embed chunk contents in batches, keeping chunk order.
 *
 * @throws InvalidInputError when the service returns the wrong number of vectors
 */
export async function embedChunks(
  embedder: Embedder,
  chunks: Chunk[],
  options: { batchSize: number; embeddingModel?: string },
  log?: Logger
): Promise<{ vectors: number[][]; tokens: number }> {
  const vectors: number[][] = [];
  let tokens = 0;

  for (let i = 0; i < chunks.length; i += options.batchSize) {
    const batch = chunks.slice(i, i + options.batchSize);
    const start = Date.now();
    const results = await embedder.embedBatch(
      batch.map(chunk => chunk.content),
      { model: options.embeddingModel }
    );

    if (results.length !== batch.length) {
      throw new InvalidInputError(
        `Embedding service returned ${results.length} vectors for ${batch.length} chunks`
      );
    }

    for (const result of results) {
      vectors.push(result.embedding);
      tokens += result.usage.totalTokens;
    }

    if (log) {
      logExternalCall(log, 'embedding', 'embed_batch', { duration_ms: Date.now() - start });
    }
  }

  return { vectors, tokens };
}

function isFatal(error: unknown): boolean {
  return error instanceof InvalidConfigError || error instanceof DimensionMismatchError;
}

// =============================================================================
// Indexer
// =============================================================================

export class CorpusIndexer {
  private readonly options: IngestionOptions;
  private readonly log: Logger;

  /**
   * @throws InvalidConfigError for invalid chunking, batch or concurrency settings
   */
  constructor(
    private readonly index: EmbeddingIndex,
    private readonly embedder: Embedder,
    options: Partial<IngestionOptions> = {},
    log: Logger = createLayerLogger('ingestion')
  ) {
    const { batchSize, concurrency, embeddingModel, ...chunkOptions } = {
      ...DEFAULT_INGESTION_OPTIONS,
      ...options,
    };

    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new InvalidConfigError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new InvalidConfigError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    this.options = {
      ...resolveChunkOptions(chunkOptions),
      batchSize,
      concurrency,
      embeddingModel,
    };
    this.log = log.child({ service: 'CorpusIndexer' });
  }

  /**
   * Chunk, embed and merge one book.
   *
   * @param signal - Checked before the merge; an aborted run leaves the index untouched
   */
  async ingestDocument(document: SourceDocument, signal?: AbortSignal): Promise<IngestedDocument> {
    const timer = new Timer();

    if (!documentText(document).trim()) {
      throw new InvalidInputError(`Document ${document.id} contains no text`);
    }

    timer.mark('chunking');
    const chunks = [...chunkDocument(document, this.options)];
    timer.measure('chunking');

    timer.mark('embedding');
    const { vectors, tokens } = await embedChunks(this.embedder, chunks, this.options, this.log);
    timer.measure('embedding');

    logRagStep(this.log, 'embedding', {
      duration_ms: timer.getDuration('embedding'),
      chunks: chunks.length,
      tokens,
      model: this.options.embeddingModel,
    });

    signal?.throwIfAborted();

    this.index.replaceDocument(
      {
        id: document.id,
        title: document.title,
        source: document.source ?? null,
        pageCount: document.pages.length,
      },
      chunks.map((chunk, i) => ({ chunk, vector: vectors[i] ?? [] }))
    );

    const result: IngestedDocument = {
      documentId: document.id,
      title: document.title,
      chunks: chunks.length,
      tokens,
      duration_ms: timer.elapsed(),
    };

    this.log.info(
      {
        event: 'document_indexed',
        ...result,
        chunking_ms: timer.getDuration('chunking'),
      },
      `Indexed ${document.title}`
    );

    return result;
  }

  /**
   * Ingest a set of books. Per-book failures are reported; configuration
   * and dimension errors abort the run.
   *
   * @throws InvalidConfigError for duplicate document ids or bad settings
   * @throws DimensionMismatchError when vectors disagree with the index
   */
  async ingest(documents: SourceDocument[]): Promise<IngestionReport> {
    const timer = new Timer();
    const ids = new Set<string>();
    for (const document of documents) {
      if (ids.has(document.id)) {
        throw new InvalidConfigError(`Duplicate document id ${document.id}`);
      }
      ids.add(document.id);
    }

    this.log.info(
      { event: 'ingestion_start', documents: documents.length, concurrency: this.options.concurrency },
      'Ingestion started'
    );

    const limit = createConcurrencyLimiter(this.options.concurrency);
    const indexed: IngestedDocument[] = [];
    const failed: FailedDocument[] = [];
    const controller = new AbortController();

    // allSettled: books still in flight finish, unmerged, before the fatal error is rethrown
    await Promise.allSettled(
      documents.map(document =>
        limit(async () => {
          if (controller.signal.aborted) return;
          try {
            indexed.push(await this.ingestDocument(document, controller.signal));
          } catch (error) {
            if (controller.signal.aborted) return;
            if (isFatal(error)) {
              controller.abort(error);
              this.log.error(
                { event: 'ingestion_aborted', documentId: document.id, error: errorMessage(error) },
                'Ingestion aborted'
              );
              return;
            }
            failed.push({
              documentId: document.id,
              error: errorMessage(error),
              code: isRAGError(error) ? error.code : null,
            });
            this.log.warn(
              { event: 'document_failed', documentId: document.id, error: errorMessage(error) },
              `Failed to index ${document.title}`
            );
          }
        })
      )
    );

    if (controller.signal.aborted) {
      throw controller.signal.reason;
    }

    const order = new Map(documents.map((document, i) => [document.id, i]));
    const byInputOrder = (a: { documentId: string }, b: { documentId: string }) =>
      (order.get(a.documentId) ?? 0) - (order.get(b.documentId) ?? 0);
    indexed.sort(byInputOrder);
    failed.sort(byInputOrder);

    const report: IngestionReport = {
      indexed,
      failed,
      chunks: indexed.reduce((sum, doc) => sum + doc.chunks, 0),
      totalChunks: this.index.size,
      corpusVersion: this.index.corpusVersion,
      duration_ms: timer.elapsed(),
    };

    this.log.info(
      {
        event: 'ingestion_complete',
        indexed: indexed.length,
        failed: failed.length,
        chunks: report.chunks,
        totalChunks: report.totalChunks,
        corpusVersion: report.corpusVersion,
        duration_ms: report.duration_ms,
      },
      'Ingestion completed'
    );

    return report;
  }

  /**
   * Delete a book from the index.
   *
   * @returns number of chunks removed
   */
  removeDocument(documentId: string): number {
    const removed = this.index.remove(documentId);
    this.log.info({ event: 'document_removed', documentId, chunks: removed }, 'Document removed');
    return removed;
  }
}

export function createCorpusIndexer(
  index: EmbeddingIndex,
  embedder: Embedder,
  options: Partial<IngestionOptions> = {}
): CorpusIndexer {
  return new CorpusIndexer(index, embedder, options);
}
