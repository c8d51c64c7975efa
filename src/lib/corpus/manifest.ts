/**
 * Corpus Manifest
 *
 * corpus.json names the books to index and where their files live.
 * loadCorpus turns it into SourceDocuments for the indexer.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { createLayerLogger, errorMessage, Timer, type Logger } from '@/lib/logger';
import { parseFile, isSupportedFileType, SUPPORTED_EXTENSIONS } from '@/lib/parsers/file-parser';
import { InvalidConfigError, InvalidInputError } from '@/lib/rag/errors';
import type { SourceDocument } from '@/types/corpus';

// =============================================================================
// Schema
// =============================================================================

export const bookEntrySchema = z.object({
  id: z.string().trim().min(1, 'Book id must not be empty'),
  title: z.string().trim().min(1, 'Book title must not be empty'),
  file: z.string().min(1),
});

export const corpusManifestSchema = z
  .object({
    booksDir: z.string().default('books'),
    books: z.array(bookEntrySchema),
  })
  .refine(
    manifest => new Set(manifest.books.map(book => book.id)).size === manifest.books.length,
    { message: 'Book ids must be unique', path: ['books'] }
  );

export type BookEntry = z.infer<typeof bookEntrySchema>;
export type CorpusManifest = z.infer<typeof corpusManifestSchema>;

export interface FailedBook extends BookEntry {
  error: string;
}

export interface LoadedCorpus {
  documents: SourceDocument[];
  missing: BookEntry[];  // Listed books whose file was not found
  failed: FailedBook[];  // Listed books whose text could not be extracted
}

type BookOutcome =
  | { status: 'loaded'; document: SourceDocument }
  | { status: 'missing'; book: BookEntry }
  | { status: 'failed'; book: FailedBook };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate a parsed manifest.
 *
 * @throws InvalidConfigError listing the problems found
 */
export function parseManifest(data: unknown): CorpusManifest {
  const result = corpusManifestSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid corpus manifest: ${issues}`, result.error);
  }

  return result.data;
}

/**
 * Read and validate a manifest file.
 */
export async function readManifest(path: string): Promise<CorpusManifest> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new InvalidConfigError(`Cannot read corpus manifest ${path}: ${errorMessage(error)}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigError(`Corpus manifest ${path} is not valid JSON`, error);
  }

  return parseManifest(data);
}

/**
 * Extract the pages of every listed book.
 *
 * Books whose file is missing are skipped and reported in `missing`;
 * books that fail to read or extract are reported in `failed`.
 * Relative booksDir paths resolve against baseDir.
 *
 * @throws InvalidInputError when a listed file has an unsupported type
 */
export async function loadCorpus(
  manifest: CorpusManifest,
  baseDir: string,
  log: Logger = createLayerLogger('ingestion')
): Promise<LoadedCorpus> {
  const unsupported = manifest.books.filter(book => !isSupportedFileType(book.file));
  if (unsupported.length > 0) {
    throw new InvalidInputError(
      `Unsupported book file type: ${unsupported.map(book => book.file).join(', ')}. ` +
      `Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  const timer = new Timer();
  const booksDir = resolve(baseDir, manifest.booksDir);

  const outcomes = await Promise.all(
    manifest.books.map(async (book): Promise<BookOutcome> => {
      const path = resolve(booksDir, book.file);

      try {
        const parsed = await parseFile(await readFile(path), book.file);
        log.debug(
          {
            event: 'book_extracted',
            documentId: book.id,
            pages: parsed.metadata.pageCount,
            words: parsed.metadata.wordCount,
          },
          'Book extracted'
        );
        return {
          status: 'loaded',
          document: { id: book.id, title: book.title, pages: parsed.pages, source: path },
        };
      } catch (error) {
        if (isNotFound(error)) {
          log.warn(
            { event: 'book_missing', documentId: book.id, path },
            'Book file not found, skipping'
          );
          return { status: 'missing', book };
        }
        log.warn(
          { event: 'book_extraction_failed', documentId: book.id, path, error: errorMessage(error) },
          'Book could not be extracted, skipping'
        );
        return { status: 'failed', book: { ...book, error: errorMessage(error) } };
      }
    })
  );

  const documents: SourceDocument[] = [];
  const missing: BookEntry[] = [];
  const failed: FailedBook[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'loaded') documents.push(outcome.document);
    else if (outcome.status === 'missing') missing.push(outcome.book);
    else failed.push(outcome.book);
  }

  log.info(
    {
      event: 'corpus_loaded',
      documents: documents.length,
      missing: missing.length,
      failed: failed.length,
      duration_ms: timer.elapsed(),
    },
    'Corpus loaded'
  );

  return { documents, missing, failed };
}

/**
 * Read the manifest at `path` and load its books, resolving booksDir
 * against the manifest's own directory.
 */
export async function loadCorpusFromManifest(path: string, log?: Logger): Promise<LoadedCorpus> {
  const manifest = await readManifest(path);
  return loadCorpus(manifest, dirname(resolve(path)), log);
}
