/**
 * Index Persistence
 *
 * Snapshot format of an EmbeddingIndex and the stores that keep it.
 * Vectors are plain doubles: JSON and Postgres double precision both
 * round-trip them exactly, so a reloaded index answers queries identically.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger, errorMessage } from '@/lib/logger';
import { InvalidConfigError } from './errors';

const log = logger.child({ layer: 'db', service: 'FileIndexStore' });

// =============================================================================
// Snapshot Schema
// =============================================================================

const spanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const pageSpanSchema = z.object({
  start: z.number().int().positive(),
  end: z.number().int().positive(),
});

export const snapshotDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  source: z.string().nullable(),
  pageCount: z.number().int().nonnegative(),
});

export const snapshotRecordSchema = z.object({
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  sequenceIndex: z.number().int().nonnegative(),
  span: spanSchema,
  pages: pageSpanSchema,
  content: z.string().min(1),
  previousId: z.string().nullable(),
  nextId: z.string().nullable(),
  vector: z.array(z.number().finite()).min(1),
});

export const indexSnapshotSchema = z.object({
  formatVersion: z.literal(1),
  corpusVersion: z.string(),
  dimension: z.number().int().positive().nullable(),
  embeddingModel: z.string().nullable(),
  createdAt: z.string().datetime(),
  documents: z.array(snapshotDocumentSchema),
  records: z.array(snapshotRecordSchema),
});

export type IndexSnapshot = z.infer<typeof indexSnapshotSchema>;
export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;
export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>;

/**
 * Validate untrusted data as a snapshot.
 *
 * @throws InvalidConfigError listing the first problems found
 */
export function parseSnapshot(data: unknown): IndexSnapshot {
  const result = indexSnapshotSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid index snapshot: ${issues}`, result.error);
  }

  return result.data;
}

// =============================================================================
// Stores
// =============================================================================

export interface IndexStore {
  /** Stored snapshot, or null when nothing has been saved yet. */
  load(): Promise<IndexSnapshot | null>;
  save(snapshot: IndexSnapshot): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Snapshot kept as a JSON file. Saves write a temp file and rename it over
 * the target, so a crash never leaves a partial snapshot behind.
 */
export class FileIndexStore implements IndexStore {
  constructor(private readonly path: string) {}

  async load(): Promise<IndexSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        log.info({ event: 'index_not_found', path: this.path }, 'No saved index');
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new InvalidConfigError(`Index file ${this.path} is not valid JSON`, error);
    }

    const snapshot = parseSnapshot(data);
    log.info(
      {
        event: 'index_loaded',
        path: this.path,
        documents: snapshot.documents.length,
        records: snapshot.records.length,
        corpusVersion: snapshot.corpusVersion,
      },
      'Index loaded'
    );
    return snapshot;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;

    await mkdir(dirname(this.path), { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(snapshot), 'utf8');
      await rename(tempPath, this.path);
    } catch (error) {
      log.error(
        { event: 'index_save_failed', path: this.path, error: errorMessage(error) },
        'Failed to save index'
      );
      await rm(tempPath, { force: true });
      throw error;
    }

    log.info(
      {
        event: 'index_saved',
        path: this.path,
        records: snapshot.records.length,
        corpusVersion: snapshot.corpusVersion,
      },
      'Index saved'
    );
  }
}

/**
 * Store held in memory, for tests and one-off runs.
 */
export class MemoryIndexStore implements IndexStore {
  private snapshot: IndexSnapshot | null = null;

  async load(): Promise<IndexSnapshot | null> {
    return this.snapshot;
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    this.snapshot = parseSnapshot(JSON.parse(JSON.stringify(snapshot)));
  }
}
