/**
 * Embedding Index
 *
 * In-memory store of chunks and their vectors for one corpus version.
 * Queries are exact: cosine similarity against every vector allowed by the
 * source filter, top-K with ties broken by lower chunk id.
 *
 * Mutations are synchronous. A document is swapped in with a single
 * replaceDocument() call, so concurrent readers never see it half-merged.
 */

import { createHash } from 'node:crypto';
import type { Chunk, DocumentInfo } from '@/types/corpus';
import type { IndexSnapshot } from './persistence';
import {
  DimensionMismatchError,
  EmptyIndexError,
  InvalidConfigError,
  InvalidInputError,
  isRAGError,
} from './errors';

// =============================================================================
// Types
// =============================================================================

export interface IndexMatch {
  chunk: Chunk;
  similarity: number;
}

export interface IndexEntry {
  chunk: Chunk;
  vector: number[];
}

interface EmbeddingRecord {
  chunk: Chunk;
  vector: number[];
  unit: number[] | null;
}

export interface EmbeddingIndexOptions {
  dimension?: number | null;
  embeddingModel?: string | null;
}

export const SNAPSHOT_FORMAT_VERSION = 1;

// =============================================================================
// Vector Math
// =============================================================================

function maxMagnitude(vector: number[]): number {
  let max = 0;
  for (const value of vector) {
    max = Math.max(max, Math.abs(value));
  }
  return max;
}

/**
 * Euclidean norm, scaled by the largest component so that squaring
 * large finite values does not overflow.
 */
export function vectorNorm(vector: number[]): number {
  const scale = maxMagnitude(vector);
  if (scale === 0) {
    return 0;
  }
  let sum = 0;
  for (const value of vector) {
    const scaled = value / scale;
    sum += scaled * scaled;
  }
  return scale * Math.sqrt(sum);
}

/**
 * Unit vector in the direction of `vector`, or null for a zero vector.
 */
export function unitVector(vector: number[]): number[] | null {
  const scale = maxMagnitude(vector);
  if (scale === 0) {
    return null;
  }
  const scaled = vector.map(value => value / scale);
  const norm = vectorNorm(scaled);
  return scaled.map(value => value / norm);
}

/**
 * Dot product of unit vectors. A zero vector scores 0.
 */
function cosineOfUnits(a: number[] | null, b: number[] | null): number {
  if (!a || !b) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  return cosineOfUnits(unitVector(a), unitVector(b));
}

/**
 * Descending similarity, then ascending chunk id.
 */
export function compareMatches(a: IndexMatch, b: IndexMatch): number {
  if (a.similarity !== b.similarity) {
    return b.similarity - a.similarity;
  }
  if (a.chunk.id === b.chunk.id) return 0;
  return a.chunk.id < b.chunk.id ? -1 : 1;
}

// =============================================================================
// Corpus Version
// =============================================================================

/**
 * Content hash over documents and their chunks, independent of insertion order.
 * First 16 hex chars of SHA-256.
 */
export function computeCorpusVersion(chunksByDocument: Map<string, Chunk[]>): string {
  const hash = createHash('sha256');
  const documentIds = [...chunksByDocument.keys()].sort();

  for (const documentId of documentIds) {
    hash.update(`${documentId}\0`);
    const chunks = [...(chunksByDocument.get(documentId) ?? [])]
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    for (const chunk of chunks) {
      hash.update(`${chunk.id}\0${chunk.content}\0`);
    }
  }

  return hash.digest('hex').slice(0, 16);
}

// =============================================================================
// Index
// =============================================================================

export class EmbeddingIndex {
  private records = new Map<string, EmbeddingRecord>();
  private chunkIdsByDocument = new Map<string, Set<string>>();
  private documentInfo = new Map<string, DocumentInfo>();
  private establishedDimension: number | null;
  private cachedVersion: string | null = null;
  readonly embeddingModel: string | null;

  constructor(options: EmbeddingIndexOptions = {}) {
    this.establishedDimension = options.dimension ?? null;
    this.embeddingModel = options.embeddingModel ?? null;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /** Number of chunks (and records) in the index. */
  get size(): number {
    return this.records.size;
  }

  /** Vector dimension, or null before the first add. */
  get dimension(): number | null {
    return this.establishedDimension;
  }

  get corpusVersion(): string {
    if (this.cachedVersion === null) {
      const chunksByDocument = new Map<string, Chunk[]>();
      for (const documentId of this.chunkIdsByDocument.keys()) {
        chunksByDocument.set(documentId, this.chunksOf(documentId));
      }
      this.cachedVersion = computeCorpusVersion(chunksByDocument);
    }
    return this.cachedVersion;
  }

  /** Indexed documents ordered by id. */
  documents(): DocumentInfo[] {
    return [...this.documentInfo.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  getDocument(documentId: string): DocumentInfo | undefined {
    return this.documentInfo.get(documentId);
  }

  hasDocument(documentId: string): boolean {
    return this.documentInfo.has(documentId);
  }

  getChunk(chunkId: string): Chunk | undefined {
    return this.records.get(chunkId)?.chunk;
  }

  /** Chunks of a document in sequence order. */
  chunksOf(documentId: string): Chunk[] {
    const ids = this.chunkIdsByDocument.get(documentId);
    if (!ids) return [];
    const chunks: Chunk[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) chunks.push(record.chunk);
    }
    return chunks.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Add or replace the record of one chunk.
   * The first vector ever added establishes the index dimension.
   *
   * @throws InvalidInputError for an empty or non-finite vector
   * @throws DimensionMismatchError when the vector length differs from the index
   */
  add(chunk: Chunk, vector: number[]): void {
    this.validateVector(vector, this.establishedDimension, `chunk ${chunk.id}`);
    this.insert(chunk, vector);

    if (!this.documentInfo.has(chunk.documentId)) {
      this.documentInfo.set(chunk.documentId, {
        id: chunk.documentId,
        title: chunk.documentId,
        source: null,
        pageCount: chunk.pages.end,
      });
    }
  }

  /**
   * Remove a document with all its chunks and records.
   *
   * @returns number of chunks removed
   */
  remove(documentId: string): number {
    const ids = this.chunkIdsByDocument.get(documentId);
    const removed = ids?.size ?? 0;

    if (ids) {
      for (const id of ids) {
        this.records.delete(id);
      }
      this.chunkIdsByDocument.delete(documentId);
    }
    this.documentInfo.delete(documentId);
    if (removed > 0) {
      this.cachedVersion = null;
    }

    return removed;
  }

  /**
   * Swap in the full chunk set of a document in one step.
   * Everything is validated before the index changes.
   */
  replaceDocument(document: DocumentInfo, entries: IndexEntry[]): void {
    if (entries.length === 0) {
      throw new InvalidInputError(`Document ${document.id} has no chunks to index`);
    }

    let dimension = this.establishedDimension;
    const seen = new Set<string>();

    for (const { chunk, vector } of entries) {
      if (chunk.documentId !== document.id) {
        throw new InvalidInputError(
          `Chunk ${chunk.id} belongs to ${chunk.documentId}, not ${document.id}`
        );
      }
      if (seen.has(chunk.id)) {
        throw new InvalidInputError(`Duplicate chunk id ${chunk.id}`);
      }
      const existing = this.records.get(chunk.id);
      if (existing && existing.chunk.documentId !== document.id) {
        throw new InvalidInputError(`Chunk id ${chunk.id} is already used by ${existing.chunk.documentId}`);
      }
      seen.add(chunk.id);

      this.validateVector(vector, dimension, `chunk ${chunk.id}`);
      dimension = vector.length;
    }

    this.remove(document.id);
    for (const { chunk, vector } of entries) {
      this.insert(chunk, vector);
    }
    this.documentInfo.set(document.id, { ...document });
  }

  private insert(chunk: Chunk, vector: number[]): void {
    const previous = this.records.get(chunk.id);
    if (previous && previous.chunk.documentId !== chunk.documentId) {
      const previousIds = this.chunkIdsByDocument.get(previous.chunk.documentId);
      previousIds?.delete(chunk.id);
      // A document without chunks is not kept
      if (previousIds?.size === 0) {
        this.chunkIdsByDocument.delete(previous.chunk.documentId);
        this.documentInfo.delete(previous.chunk.documentId);
      }
    }

    this.records.set(chunk.id, { chunk, vector: [...vector], unit: unitVector(vector) });

    let ids = this.chunkIdsByDocument.get(chunk.documentId);
    if (!ids) {
      ids = new Set();
      this.chunkIdsByDocument.set(chunk.documentId, ids);
    }
    ids.add(chunk.id);

    this.establishedDimension ??= vector.length;
    this.cachedVersion = null;
  }

  private validateVector(vector: number[], dimension: number | null, context: string): void {
    if (vector.length === 0) {
      throw new InvalidInputError(`Empty vector for ${context}`);
    }
    if (!vector.every(Number.isFinite)) {
      throw new InvalidInputError(`Vector for ${context} contains non-finite values`);
    }
    if (dimension !== null && vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, vector.length, context);
    }
  }

  // ===========================================================================
  // Query
  // ===========================================================================

  /**
   * Top-K chunks by cosine similarity, restricted to allowed documents.
   * Never pads: fewer than topK matches are returned when fewer exist.
   *
   * @throws InvalidConfigError when topK is not a positive integer
   * @throws DimensionMismatchError when the query vector length differs
   * @throws EmptyIndexError when no chunk exists under the filter
   */
  query(
    vector: number[],
    topK: number,
    allowedDocuments?: Iterable<string>
  ): IndexMatch[] {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidConfigError(`topK must be a positive integer, got ${topK}`);
    }
    this.validateVector(vector, this.establishedDimension, 'query');

    const candidates = this.candidateIds(allowedDocuments);
    if (candidates.length === 0) {
      throw new EmptyIndexError();
    }

    const queryUnit = unitVector(vector);
    const matches: IndexMatch[] = [];
    for (const id of candidates) {
      const record = this.records.get(id);
      if (!record) continue;
      matches.push({
        chunk: record.chunk,
        similarity: cosineOfUnits(queryUnit, record.unit),
      });
    }

    return matches.sort(compareMatches).slice(0, topK);
  }

  private candidateIds(allowedDocuments?: Iterable<string>): string[] {
    if (allowedDocuments === undefined) {
      return [...this.records.keys()];
    }
    const ids: string[] = [];
    for (const documentId of new Set(allowedDocuments)) {
      const chunkIds = this.chunkIdsByDocument.get(documentId);
      if (chunkIds) ids.push(...chunkIds);
    }
    return ids;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  toSnapshot(createdAt: Date = new Date()): IndexSnapshot {
    const documents = this.documents();
    return {
      formatVersion: SNAPSHOT_FORMAT_VERSION,
      corpusVersion: this.corpusVersion,
      dimension: this.establishedDimension,
      embeddingModel: this.embeddingModel,
      createdAt: createdAt.toISOString(),
      documents: documents.map(doc => ({ ...doc })),
      records: documents.flatMap(doc =>
        this.chunksOf(doc.id).map(chunk => ({
          chunkId: chunk.id,
          documentId: chunk.documentId,
          sequenceIndex: chunk.sequenceIndex,
          span: { ...chunk.span },
          pages: { ...chunk.pages },
          content: chunk.content,
          previousId: chunk.previousId,
          nextId: chunk.nextId,
          vector: [...(this.records.get(chunk.id)?.vector ?? [])],
        }))
      ),
    };
  }

  /**
   * Rebuild an index from a validated snapshot.
   *
   * @throws InvalidConfigError when the snapshot is inconsistent
   */
  static fromSnapshot(snapshot: IndexSnapshot): EmbeddingIndex {
    const index = new EmbeddingIndex({
      dimension: snapshot.dimension,
      embeddingModel: snapshot.embeddingModel,
    });

    const entriesByDocument = new Map<string, IndexEntry[]>();
    for (const record of snapshot.records) {
      const entries = entriesByDocument.get(record.documentId) ?? [];
      entries.push({
        chunk: {
          id: record.chunkId,
          documentId: record.documentId,
          sequenceIndex: record.sequenceIndex,
          content: record.content,
          span: { ...record.span },
          pages: { ...record.pages },
          previousId: record.previousId,
          nextId: record.nextId,
        },
        vector: record.vector,
      });
      entriesByDocument.set(record.documentId, entries);
    }

    try {
      for (const document of snapshot.documents) {
        const entries = entriesByDocument.get(document.id);
        if (!entries) {
          throw new InvalidConfigError(`Snapshot document ${document.id} has no records`);
        }
        index.replaceDocument(document, entries);
        entriesByDocument.delete(document.id);
      }
    } catch (error) {
      if (isRAGError(error) && !(error instanceof InvalidConfigError)) {
        throw new InvalidConfigError(`Invalid index snapshot: ${error.message}`, error);
      }
      throw error;
    }

    const orphan = entriesByDocument.keys().next();
    if (!orphan.done) {
      throw new InvalidConfigError(`Snapshot records reference unknown document ${orphan.value}`);
    }
    if (index.corpusVersion !== snapshot.corpusVersion) {
      throw new InvalidConfigError(
        `Snapshot corpus version ${snapshot.corpusVersion} does not match its content (${index.corpusVersion})`
      );
    }

    return index;
  }
}
