/**
 * Corpus domain types.
 *
 * A book is ingested as a SourceDocument, split into Chunks, and each chunk
 * is stored in the EmbeddingIndex alongside its vector.
 */

/**
 * Character range into a document's text. End is exclusive.
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * 1-based, inclusive page range.
 */
export interface PageSpan {
  start: number;
  end: number;
}

/**
 * A book as extracted from its file.
 */
export interface SourceDocument {
  id: string;            // Source name, unique in the corpus
  title: string;
  pages: string[];       // Raw page texts in order
  source?: string;       // File path the pages came from
}

/**
 * Document metadata kept by the index once the pages are chunked.
 */
export interface DocumentInfo {
  id: string;
  title: string;
  source: string | null;
  pageCount: number;
}

export interface Chunk {
  id: string;                  // `${documentId}#${sequence}`
  documentId: string;
  sequenceIndex: number;
  content: string;
  span: TextSpan;
  pages: PageSpan;
  previousId: string | null;   // Neighbour sharing the leading overlap
  nextId: string | null;       // Neighbour sharing the trailing overlap
}
