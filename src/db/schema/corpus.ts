/**
 * Corpus Index Schema (Drizzle ORM)
 *
 * One row per saved index in corpus_indexes, one row per chunk in
 * index_records. Vectors are stored as double precision arrays so a
 * reloaded index reproduces the saved one bit for bit.
 */

import {
  pgTable,
  varchar,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import type { SnapshotDocument } from '@/lib/rag/persistence';

// =============================================================================
// Corpus Indexes Table
// =============================================================================

export const corpusIndexes = pgTable('corpus_indexes', {
  name: varchar('name', { length: 100 }).primaryKey(),
  formatVersion: integer('format_version').notNull().default(1),
  corpusVersion: varchar('corpus_version', { length: 64 }).notNull(),
  dimension: integer('dimension'),
  embeddingModel: varchar('embedding_model', { length: 200 }),

  // Book metadata (JSONB array)
  documents: jsonb('documents').$type<SnapshotDocument[]>().notNull().default([]),

  // Timestamps
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
});

// =============================================================================
// Index Records Table
// =============================================================================

export const indexRecords = pgTable('index_records', {
  indexName: varchar('index_name', { length: 100 })
    .notNull()
    .references(() => corpusIndexes.name, { onDelete: 'cascade' }),
  chunkId: varchar('chunk_id', { length: 300 }).notNull(),
  documentId: varchar('document_id', { length: 200 }).notNull(),
  sequenceIndex: integer('sequence_index').notNull(),
  content: text('content').notNull(),

  // Position tracking
  spanStart: integer('span_start').notNull(),
  spanEnd: integer('span_end').notNull(),
  pageStart: integer('page_start').notNull(),
  pageEnd: integer('page_end').notNull(),

  // Overlap neighbours
  previousId: varchar('previous_id', { length: 300 }),
  nextId: varchar('next_id', { length: 300 }),

  embedding: doublePrecision('embedding').array().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.indexName, table.chunkId] }),
  documentIdx: index('idx_index_records_document').on(table.indexName, table.documentId),
}));

// =============================================================================
// Relations
// =============================================================================

export const corpusIndexesRelations = relations(corpusIndexes, ({ many }) => ({
  records: many(indexRecords),
}));

export const indexRecordsRelations = relations(indexRecords, ({ one }) => ({
  index: one(corpusIndexes, {
    fields: [indexRecords.indexName],
    references: [corpusIndexes.name],
  }),
}));

// =============================================================================
// Types
// =============================================================================

export type CorpusIndexRow = typeof corpusIndexes.$inferSelect;
export type NewCorpusIndexRow = typeof corpusIndexes.$inferInsert;
export type IndexRecordRow = typeof indexRecords.$inferSelect;
export type NewIndexRecordRow = typeof indexRecords.$inferInsert;
