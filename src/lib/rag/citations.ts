/**
 * Citation Service
 *
 * Maps generated answers back to the passages that were sent in the prompt.
 * Markers the model invents are reported, never raised.
 */

import type { PageSpan, TextSpan } from '@/types/corpus';
import { logger, type Logger } from '@/lib/logger';
import { formatPageRange } from '@/lib/llm/prompts';
import type { CitationContext } from './prompt-builder';

const defaultLog = logger.child({ layer: 'rag', service: 'Citations' });

// =============================================================================
// Types
// =============================================================================

export interface CitationRef {
  marker: number;
  chunkId: string;
  documentId: string;
  documentTitle: string;
  sequenceIndex: number;
  span: TextSpan;
  pages: PageSpan;
  excerpt: string;
  similarity: number;
  confidence: number;
  source: string | null;
}

export interface Answer {
  text: string;
  citations: CitationRef[];
  unresolvedMarkers: number[];
}

// =============================================================================
// Marker Parsing
// =============================================================================

// [Citation 2], [2], [Citations 1, 3], [1, 3]
const CITATION_REGEX = /\[(?:citations?\s*)?(\d+(?:\s*,\s*\d+)*)\]/gi;

const EXCERPT_LENGTH = 200;

/**
 * Marker numbers in order of first appearance.
 */
export function extractCitationMarkers(text: string): number[] {
  const markers: number[] = [];
  const seen = new Set<number>();

  for (const match of text.matchAll(CITATION_REGEX)) {
    const list = match[1] ?? '';
    for (const part of list.split(',')) {
      const marker = parseInt(part.trim(), 10);
      if (!Number.isNaN(marker) && !seen.has(marker)) {
        seen.add(marker);
        markers.push(marker);
      }
    }
  }

  return markers;
}

function excerptOf(content: string): string {
  const text = content.replace(/\s+/g, ' ').trim();
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

// =============================================================================
// Answer Formatting
// =============================================================================

/**
 * Resolve the markers of a generated answer against the prompt context.
 * Citations come back de-duplicated and ordered by marker number.
 */
export function formatAnswer(
  rawOutput: string,
  context: CitationContext,
  log: Logger = defaultLog
): Answer {
  const text = rawOutput.trim();
  const citations: CitationRef[] = [];
  const unresolvedMarkers: number[] = [];

  for (const marker of extractCitationMarkers(text)) {
    const entry = context.get(marker);
    if (!entry) {
      unresolvedMarkers.push(marker);
      continue;
    }
    citations.push({
      marker,
      chunkId: entry.chunk.id,
      documentId: entry.document.id,
      documentTitle: entry.document.title,
      sequenceIndex: entry.chunk.sequenceIndex,
      span: { ...entry.chunk.span },
      pages: { ...entry.chunk.pages },
      excerpt: excerptOf(entry.chunk.content),
      similarity: entry.similarity,
      confidence: entry.confidence,
      source: entry.document.source,
    });
  }

  citations.sort((a, b) => a.marker - b.marker);
  unresolvedMarkers.sort((a, b) => a - b);

  if (unresolvedMarkers.length > 0) {
    log.warn(
      { event: 'citation_unresolved', markers: unresolvedMarkers, contextSize: context.size },
      'Answer cites passages that were not in the prompt'
    );
  }

  return { text, citations, unresolvedMarkers };
}

/**
 * Generate a sources section for the answer, one line per book.
 */
export function formatSourcesSection(citations: CitationRef[]): string {
  if (citations.length === 0) {
    return '';
  }

  const books = new Map<string, { title: string; pages: string[] }>();

  for (const citation of citations) {
    const book = books.get(citation.documentId) ?? { title: citation.documentTitle, pages: [] };
    const range = formatPageRange(citation.pages);
    if (!book.pages.includes(range)) {
      book.pages.push(range);
    }
    books.set(citation.documentId, book);
  }

  const lines = ['Sources:'];
  let sourceNum = 1;

  for (const [, book] of books) {
    lines.push(`${sourceNum}. ${book.title} (${book.pages.join(', ')})`);
    sourceNum++;
  }

  return lines.join('\n');
}

/**
 * Calculate overall confidence for a cited answer.
 * Based on the confidence of used citations.
 */
export function calculateOverallConfidence(citations: CitationRef[]): number {
  if (citations.length === 0) {
    return 0;
  }

  const totalConfidence = citations.reduce((sum, c) => sum + c.confidence, 0);
  return totalConfidence / citations.length;
}
