/**
 * Index Build
 *
 * Brings the saved index up to date with the corpus manifest: loads the
 * previous snapshot (unless a fresh build is asked for), drops books no
 * longer listed, re-ingests the selected books and saves the result.
 */

import type { Logger } from '@/lib/logger';
import type { RAGConfig } from '@/lib/rag/config';
import { EmbeddingIndex } from '@/lib/rag/embedding-index';
import { InvalidInputError } from '@/lib/rag/errors';
import { CorpusIndexer, type IngestionReport } from '@/lib/rag/ingestion';
import type { IndexStore } from '@/lib/rag/persistence';
import type { Embedder } from '@/types/llm';
import type { LoadedCorpus } from './manifest';

export interface BuildIndexOptions {
  fresh?: boolean;
  books?: string[];
}

export interface BuildIndexResult {
  report: IngestionReport;
  removed: string[];
  documents: number;
  chunks: number;
}

type BuildConfig = Pick<
  RAGConfig,
  'chunkSize' | 'chunkOverlap' | 'embeddingBatchSize' | 'ingestConcurrency' | 'embeddingModel'
>;

async function loadStartingIndex(
  store: IndexStore,
  config: BuildConfig,
  fresh: boolean,
  log: Logger
): Promise<EmbeddingIndex> {
  const snapshot = fresh ? null : await store.load();

  if (!snapshot) {
    return new EmbeddingIndex({ embeddingModel: config.embeddingModel });
  }

  if (snapshot.embeddingModel !== null && snapshot.embeddingModel !== config.embeddingModel) {
    log.warn(
      {
        event: 'embedding_model_changed',
        indexModel: snapshot.embeddingModel,
        configuredModel: config.embeddingModel,
      },
      'Embedding model changed, rebuilding the whole index'
    );
    return new EmbeddingIndex({ embeddingModel: config.embeddingModel });
  }

  return EmbeddingIndex.fromSnapshot(snapshot);
}

/**
 * @throws InvalidInputError for unknown book ids or when no selected book could be loaded
 */
export async function buildIndex(
  corpus: LoadedCorpus,
  store: IndexStore,
  embedder: Embedder,
  config: BuildConfig,
  options: BuildIndexOptions,
  log: Logger
): Promise<BuildIndexResult> {
  const listed = new Set([
    ...corpus.documents.map(doc => doc.id),
    ...corpus.missing.map(book => book.id),
    ...corpus.failed.map(book => book.id),
  ]);
  const selected = options.books ?? [];

  const unknown = selected.filter(id => !listed.has(id));
  if (unknown.length > 0) {
    throw new InvalidInputError(`Unknown book: ${unknown.join(', ')}`);
  }

  const toIngest = selected.length > 0
    ? corpus.documents.filter(doc => selected.includes(doc.id))
    : corpus.documents;

  if (toIngest.length === 0) {
    throw new InvalidInputError('None of the selected books could be loaded');
  }

  const index = await loadStartingIndex(store, config, options.fresh ?? false, log);
  const indexer = new CorpusIndexer(
    index,
    embedder,
    {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      batchSize: config.embeddingBatchSize,
      concurrency: config.ingestConcurrency,
      embeddingModel: config.embeddingModel,
    },
    log
  );

  const removed: string[] = [];
  if (selected.length === 0) {
    for (const doc of index.documents()) {
      if (!listed.has(doc.id)) {
        indexer.removeDocument(doc.id);
        removed.push(doc.id);
      }
    }
  }

  const report = await indexer.ingest(toIngest);
  await store.save(index.toSnapshot());

  return {
    report,
    removed,
    documents: index.documents().length,
    chunks: index.size,
  };
}
