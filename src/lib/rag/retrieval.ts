/**
 * Retrieval Service
 *
 * Embeds a question and searches the embedding index for the closest
 * passages, restricted to the selected books. Returns matches with
 * confidence scores for prompting.
 */

import type { Chunk, DocumentInfo } from '@/types/corpus';
import type { Embedder } from '@/types/llm';
import { logger, type Logger } from '@/lib/logger';
import type { EmbeddingIndex } from './embedding-index';
import { InvalidInputError } from './errors';
import {
  DEFAULT_TOP_K,
  DEFAULT_SIMILARITY_THRESHOLD,
  SIMILARITY_TIER_VERY_HIGH,
  SIMILARITY_TIER_HIGH,
  SIMILARITY_TIER_MEDIUM,
  SIMILARITY_CONFIDENCE_VERY_HIGH_BASE,
  SIMILARITY_CONFIDENCE_VERY_HIGH_MULT,
  SIMILARITY_CONFIDENCE_HIGH_BASE,
  SIMILARITY_CONFIDENCE_HIGH_MULT,
  SIMILARITY_CONFIDENCE_MEDIUM_BASE,
  SIMILARITY_CONFIDENCE_MEDIUM_MULT,
  SIMILARITY_CONFIDENCE_LOW_MULT,
  CONFIDENCE_LABEL_HIGH_THRESHOLD,
  CONFIDENCE_LABEL_MEDIUM_THRESHOLD,
} from './config';

const defaultLog = logger.child({ layer: 'rag', service: 'Retrieval' });

// =============================================================================
// Types
// =============================================================================

export interface RetrievedChunk {
  chunk: Chunk;
  document: DocumentInfo;
  similarity: number;
  confidence: number;
}

export interface RetrievalResult {
  matches: RetrievedChunk[];
  question: string;
  belowThreshold: number;
  queryEmbeddingTokens: number;
}

export interface RetrievalQuery {
  question: string;
  topK?: number;
  similarityThreshold?: number;
  allowedDocuments?: Iterable<string>;
}

export interface RetrievalOptions {
  topK: number;
  similarityThreshold: number;
  embeddingModel?: string;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: DEFAULT_TOP_K,
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
};

// =============================================================================
// Retriever
// =============================================================================

export class Retriever {
  private readonly options: RetrievalOptions;

  constructor(
    private readonly index: EmbeddingIndex,
    private readonly embedder: Embedder,
    options: Partial<RetrievalOptions> = {}
  ) {
    this.options = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
  }

  /**
   * Retrieve the passages closest to a question.
   * An empty result (everything under the threshold) is a valid outcome.
   *
   * @throws InvalidInputError for an empty question
   * @throws EmptyIndexError when nothing is indexed under the filter
   */
  async retrieve(query: RetrievalQuery, log: Logger = defaultLog): Promise<RetrievalResult> {
    const question = query.question.trim();
    if (!question) {
      throw new InvalidInputError('Question must not be empty');
    }

    const topK = query.topK ?? this.options.topK;
    const threshold = query.similarityThreshold ?? this.options.similarityThreshold;

    const { embedding, usage } = await this.embedder.embed(question, {
      model: this.options.embeddingModel,
    });

    const rawMatches = this.index.query(embedding, topK, query.allowedDocuments);

    const matches: RetrievedChunk[] = [];
    for (const match of rawMatches) {
      if (match.similarity < threshold) continue;
      const document = this.index.getDocument(match.chunk.documentId);
      if (!document) continue;
      matches.push({
        chunk: match.chunk,
        document,
        similarity: match.similarity,
        confidence: calculateConfidence(match.similarity),
      });
    }

    const belowThreshold = rawMatches.length - matches.length;

    log.info(
      {
        event: 'retrieval_complete',
        candidates: rawMatches.length,
        matches: matches.length,
        belowThreshold,
        topSimilarity: rawMatches[0]?.similarity ?? null,
        threshold,
      },
      'Retrieved passages'
    );

    return {
      matches,
      question,
      belowThreshold,
      queryEmbeddingTokens: usage.totalTokens,
    };
  }
}

export function createRetriever(
  index: EmbeddingIndex,
  embedder: Embedder,
  options: Partial<RetrievalOptions> = {}
): Retriever {
  return new Retriever(index, embedder, options);
}

// =============================================================================
// Confidence
// =============================================================================

/**
 * Convert cosine similarity to a confidence score in [0, 1].
 */
export function calculateConfidence(similarity: number): number {
  let confidence: number;
  if (similarity >= SIMILARITY_TIER_VERY_HIGH) {
    confidence = SIMILARITY_CONFIDENCE_VERY_HIGH_BASE +
      (similarity - SIMILARITY_TIER_VERY_HIGH) * SIMILARITY_CONFIDENCE_VERY_HIGH_MULT;
  } else if (similarity >= SIMILARITY_TIER_HIGH) {
    confidence = SIMILARITY_CONFIDENCE_HIGH_BASE +
      (similarity - SIMILARITY_TIER_HIGH) * SIMILARITY_CONFIDENCE_HIGH_MULT;
  } else if (similarity >= SIMILARITY_TIER_MEDIUM) {
    confidence = SIMILARITY_CONFIDENCE_MEDIUM_BASE +
      (similarity - SIMILARITY_TIER_MEDIUM) * SIMILARITY_CONFIDENCE_MEDIUM_MULT;
  } else {
    confidence = similarity * SIMILARITY_CONFIDENCE_LOW_MULT;
  }
  return Math.min(1, Math.max(0, confidence));
}

/**
 * Get confidence level label.
 */
export function getConfidenceLabel(confidence: number): 'high' | 'medium' | 'low' {
  if (confidence >= CONFIDENCE_LABEL_HIGH_THRESHOLD) return 'high';
  if (confidence >= CONFIDENCE_LABEL_MEDIUM_THRESHOLD) return 'medium';
  return 'low';
}
