/**
 * Postgres Index Store
 *
 * Keeps named index snapshots in corpus_indexes / index_records.
 * A save replaces the whole named index inside one transaction.
 */

import { asc, eq } from 'drizzle-orm';
import { logger, errorMessage, logDbOperation, Timer } from '@/lib/logger';
import { parseSnapshot, type IndexSnapshot, type IndexStore } from '@/lib/rag/persistence';
import type { Database } from './client';
import {
  corpusIndexes,
  indexRecords,
  type CorpusIndexRow,
  type IndexRecordRow,
  type NewCorpusIndexRow,
  type NewIndexRecordRow,
} from './schema';

const log = logger.child({ layer: 'db', service: 'PostgresIndexStore' });

// Keeps each INSERT well under the Postgres bind parameter limit
const INSERT_BATCH_SIZE = 500;

// =============================================================================
// Row Mapping
// =============================================================================

export function snapshotToRows(
  name: string,
  snapshot: IndexSnapshot
): { index: NewCorpusIndexRow; records: NewIndexRecordRow[] } {
  return {
    index: {
      name,
      formatVersion: snapshot.formatVersion,
      corpusVersion: snapshot.corpusVersion,
      dimension: snapshot.dimension,
      embeddingModel: snapshot.embeddingModel,
      documents: snapshot.documents,
      createdAt: new Date(snapshot.createdAt),
    },
    records: snapshot.records.map(record => ({
      indexName: name,
      chunkId: record.chunkId,
      documentId: record.documentId,
      sequenceIndex: record.sequenceIndex,
      content: record.content,
      spanStart: record.span.start,
      spanEnd: record.span.end,
      pageStart: record.pages.start,
      pageEnd: record.pages.end,
      previousId: record.previousId,
      nextId: record.nextId,
      embedding: record.vector,
    })),
  };
}

/**
 * Rebuild a snapshot from stored rows.
 *
 * @throws InvalidConfigError when the stored rows do not form a valid snapshot
 */
export function rowsToSnapshot(
  index: Pick<CorpusIndexRow, 'formatVersion' | 'corpusVersion' | 'dimension' | 'embeddingModel' | 'documents' | 'createdAt'>,
  records: Omit<IndexRecordRow, 'indexName'>[]
): IndexSnapshot {
  return parseSnapshot({
    formatVersion: index.formatVersion,
    corpusVersion: index.corpusVersion,
    dimension: index.dimension,
    embeddingModel: index.embeddingModel,
    createdAt: index.createdAt.toISOString(),
    documents: index.documents,
    records: records.map(row => ({
      chunkId: row.chunkId,
      documentId: row.documentId,
      sequenceIndex: row.sequenceIndex,
      span: { start: row.spanStart, end: row.spanEnd },
      pages: { start: row.pageStart, end: row.pageEnd },
      content: row.content,
      previousId: row.previousId,
      nextId: row.nextId,
      vector: row.embedding,
    })),
  });
}

// =============================================================================
// Store
// =============================================================================

export class PostgresIndexStore implements IndexStore {
  constructor(
    private readonly db: Database,
    private readonly name: string
  ) {}

  async load(): Promise<IndexSnapshot | null> {
    const timer = new Timer();

    const [index] = await this.db
      .select()
      .from(corpusIndexes)
      .where(eq(corpusIndexes.name, this.name))
      .limit(1);

    if (!index) {
      log.info({ event: 'index_not_found', name: this.name }, 'No saved index');
      return null;
    }

    const records = await this.db
      .select()
      .from(indexRecords)
      .where(eq(indexRecords.indexName, this.name))
      .orderBy(asc(indexRecords.documentId), asc(indexRecords.sequenceIndex));

    logDbOperation(log, 'select', {
      table: 'index_records',
      rows: records.length,
      duration_ms: timer.elapsed(),
    });

    const snapshot = rowsToSnapshot(index, records);
    log.info(
      {
        event: 'index_loaded',
        name: this.name,
        documents: snapshot.documents.length,
        records: snapshot.records.length,
        corpusVersion: snapshot.corpusVersion,
      },
      'Index loaded'
    );
    return snapshot;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    const timer = new Timer();
    const rows = snapshotToRows(this.name, snapshot);

    try {
      await this.db.transaction(async (tx) => {
        // Records go with the index row (ON DELETE CASCADE)
        await tx.delete(corpusIndexes).where(eq(corpusIndexes.name, this.name));
        await tx.insert(corpusIndexes).values(rows.index);

        for (let i = 0; i < rows.records.length; i += INSERT_BATCH_SIZE) {
          await tx.insert(indexRecords).values(rows.records.slice(i, i + INSERT_BATCH_SIZE));
        }
      });
    } catch (error) {
      logDbOperation(log, 'save', {
        table: 'index_records',
        duration_ms: timer.elapsed(),
        error: errorMessage(error),
      });
      throw error;
    }

    logDbOperation(log, 'save', {
      table: 'index_records',
      rows: rows.records.length,
      duration_ms: timer.elapsed(),
    });
    log.info(
      {
        event: 'index_saved',
        name: this.name,
        records: rows.records.length,
        corpusVersion: snapshot.corpusVersion,
      },
      'Index saved'
    );
  }
}
