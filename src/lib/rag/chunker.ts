/**
 * Document Chunker
 *
 * Splits documents into overlapping chunks for retrieval.
 * Cuts prefer natural breaks (paragraph, sentence, clause, word) near the
 * target size. Text is never normalized, so every chunk's span indexes the
 * original document text exactly.
 */

import type { Chunk, PageSpan, SourceDocument, TextSpan } from '@/types/corpus';
import {
  DEFAULT_BOUNDARY_WINDOW,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
} from './config';
import { InvalidConfigError, InvalidInputError } from './errors';

// =============================================================================
// Types
// =============================================================================

export interface TextChunk {
  content: string;
  sequenceIndex: number;
  span: TextSpan;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  preserveSentences: boolean;
  boundaryWindow: number;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
  preserveSentences: true,
  boundaryWindow: DEFAULT_BOUNDARY_WINDOW,
};

/**
 * Separator placed between pages to form the document text.
 */
export const PAGE_SEPARATOR = '\n\n';

/**
 * Break patterns in order of preference. A cut lands at the end of a match.
 */
const BREAK_PATTERNS: RegExp[] = [
  /\n[^\S\n]*\n\s*/g,      // paragraph
  /[.!?]["'”’)\]]*\s+/g,   // sentence
  /[,;:]\s+/g,              // clause
  /\s+/g,                   // word
];

// =============================================================================
// Chunking Functions
// =============================================================================

/**
 * Split text into overlapping chunks.
 *
 * Returns a lazy iterable; each iteration starts again from the beginning.
 * Options are validated immediately.
 *
 * @throws InvalidConfigError for invalid sizes or blank text
 */
export function chunkText(
  text: string,
  options: Partial<ChunkOptions> = {}
): Iterable<TextChunk> {
  const opts = resolveChunkOptions(options);

  if (!text.trim()) {
    throw new InvalidConfigError('Cannot chunk empty text');
  }

  return {
    [Symbol.iterator]: () => generateTextChunks(text, opts),
  };
}

/**
 * Fill in defaults and validate.
 *
 * @throws InvalidConfigError for invalid sizes
 */
export function resolveChunkOptions(options: Partial<ChunkOptions> = {}): ChunkOptions {
  const opts = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  const { chunkSize, chunkOverlap, boundaryWindow } = opts;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new InvalidConfigError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new InvalidConfigError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
  if (!Number.isInteger(boundaryWindow) || boundaryWindow < 0) {
    throw new InvalidConfigError(`boundaryWindow must be a non-negative integer, got ${boundaryWindow}`);
  }

  return opts;
}

function* generateTextChunks(text: string, opts: ChunkOptions): Generator<TextChunk> {
  const { chunkSize, chunkOverlap, preserveSentences, boundaryWindow } = opts;
  let start = 0;
  let sequenceIndex = 0;

  while (true) {
    const target = start + chunkSize;

    if (target >= text.length) {
      yield { content: text.slice(start), sequenceIndex, span: { start, end: text.length } };
      return;
    }

    // Lower bound keeps every step moving forward past the overlap
    const lowerBound = Math.max(start + chunkOverlap + 1, target - boundaryWindow);
    const end = preserveSentences
      ? findBreak(text, start, lowerBound, target)
      : target;

    yield { content: text.slice(start, end), sequenceIndex, span: { start, end } };

    start = end - chunkOverlap;
    sequenceIndex++;
  }
}

/**
 * Find the preferred cut position in [lowerBound, target].
 * Falls back to a hard cut at the target.
 */
function findBreak(
  text: string,
  start: number,
  lowerBound: number,
  target: number
): number {
  const region = text.slice(start, target);

  for (const pattern of BREAK_PATTERNS) {
    const regex = new RegExp(pattern.source, pattern.flags);
    let best = -1;
    let match: RegExpExecArray | null;

    while ((match = regex.exec(region)) !== null) {
      const cut = start + match.index + match[0].length;
      if (cut >= lowerBound) {
        best = cut;
      }
    }

    if (best !== -1) {
      return best;
    }
  }

  return target;
}

// =============================================================================
// Documents
// =============================================================================

/**
 * Text a document is chunked from: its pages joined by PAGE_SEPARATOR.
 */
export function documentText(document: Pick<SourceDocument, 'pages'>): string {
  return document.pages.join(PAGE_SEPARATOR);
}

/**
 * Start offset of each page within the document text.
 */
export function pageOffsets(pages: string[]): number[] {
  const offsets: number[] = [];
  let offset = 0;
  for (const page of pages) {
    offsets.push(offset);
    offset += page.length + PAGE_SEPARATOR.length;
  }
  return offsets;
}

/**
 * 1-based page number containing the character at offset.
 */
function pageAt(offsets: number[], offset: number): number {
  let low = 0;
  let high = offsets.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    const midOffset = offsets[mid] ?? 0;
    if (midOffset <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

/**
 * Pages covered by a span of the document text.
 */
export function pagesForSpan(offsets: number[], span: TextSpan): PageSpan {
  return {
    start: pageAt(offsets, span.start),
    end: pageAt(offsets, span.end - 1),
  };
}

/**
 * Corpus-unique chunk id.
 */
export function chunkId(documentId: string, sequenceIndex: number): string {
  return `${documentId}#${String(sequenceIndex).padStart(6, '0')}`;
}

/**
 * Split a document into chunks carrying ids, page ranges and neighbour links.
 *
 * @throws InvalidInputError for a document without id
 * @throws InvalidConfigError for invalid sizes or a blank document
 */
export function chunkDocument(
  document: SourceDocument,
  options: Partial<ChunkOptions> = {}
): Iterable<Chunk> {
  if (!document.id.trim()) {
    throw new InvalidInputError('Document id must not be empty');
  }

  const textChunks = chunkText(documentText(document), options);
  const offsets = pageOffsets(document.pages);

  return {
    [Symbol.iterator]: function* (): Generator<Chunk> {
      let pending: TextChunk | undefined;

      for (const next of textChunks) {
        if (pending) {
          yield toChunk(document.id, pending, offsets, true);
        }
        pending = next;
      }

      if (pending) {
        yield toChunk(document.id, pending, offsets, false);
      }
    },
  };
}

function toChunk(
  documentId: string,
  textChunk: TextChunk,
  offsets: number[],
  hasNext: boolean
): Chunk {
  const { sequenceIndex } = textChunk;
  return {
    id: chunkId(documentId, sequenceIndex),
    documentId,
    sequenceIndex,
    content: textChunk.content,
    span: textChunk.span,
    pages: pagesForSpan(offsets, textChunk.span),
    previousId: sequenceIndex > 0 ? chunkId(documentId, sequenceIndex - 1) : null,
    nextId: hasNext ? chunkId(documentId, sequenceIndex + 1) : null,
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Estimate token count (rough approximation: ~4 chars per token for English).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Rebuild the original text from chunks in sequence order.
 */
export function reconstructText(
  chunks: Iterable<{ content: string }>,
  overlap: number
): string {
  let text = '';
  let first = true;
  for (const chunk of chunks) {
    text += first ? chunk.content : chunk.content.slice(overlap);
    first = false;
  }
  return text;
}
