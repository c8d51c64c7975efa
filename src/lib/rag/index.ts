/**
 * RAG Module Exports
 *
 * Provides all RAG pipeline functionality:
 * - Document chunking
 * - Embedding index and persistence
 * - Retrieval and prompt assembly
 * - Citation mapping
 * - Corpus ingestion
 * - Complete RAG service
 */

// Errors
export {
  RAGError,
  InvalidConfigError,
  DimensionMismatchError,
  EmptyIndexError,
  NoContextAvailableError,
  ServiceUnavailableError,
  RateLimitedError,
  ServiceTimeoutError,
  InvalidInputError,
  isRAGError,
  isRetryableError,
  type RAGErrorCode,
  type ServiceName,
} from './errors';

// Configuration
export {
  loadRAGConfig,
  DEFAULT_RAG_CONFIG,
  MAX_HISTORY_MESSAGES,
  type RAGConfig,
  type ContextUnit,
  type IndexStoreKind,
} from './config';

// Chunker
export {
  chunkText,
  chunkDocument,
  estimateTokens,
  reconstructText,
  type ChunkOptions,
  type TextChunk,
} from './chunker';

// Embedding index
export {
  EmbeddingIndex,
  cosineSimilarity,
  type IndexMatch,
  type IndexEntry,
} from './embedding-index';

// Persistence
export {
  FileIndexStore,
  MemoryIndexStore,
  parseSnapshot,
  type IndexStore,
  type IndexSnapshot,
} from './persistence';

// Resilience
export {
  withTimeout,
  withRetry,
  classifyServiceError,
  createResilientEmbedder,
  createResilientGenerator,
  resilienceOptionsFromConfig,
  type RetryPolicy,
  type ResilienceOptions,
} from './resilience';

// Retrieval
export {
  Retriever,
  createRetriever,
  calculateConfidence,
  getConfidenceLabel,
  type RetrievedChunk,
  type RetrievalResult,
  type RetrievalQuery,
  type RetrievalOptions,
} from './retrieval';

// Prompt
export {
  buildPrompt,
  renderPrompt,
  type BuiltPrompt,
  type CitationContext,
  type ContextEntry,
  type PromptOptions,
} from './prompt-builder';

// Citations
export {
  formatAnswer,
  formatSourcesSection,
  calculateOverallConfidence,
  type Answer,
  type CitationRef,
} from './citations';

// Ingestion
export {
  CorpusIndexer,
  createCorpusIndexer,
  type IngestionOptions,
  type IngestionReport,
} from './ingestion';

// RAG Service
export {
  RAGService,
  createRAGService,
  createRAGServiceFromConfig,
  type RAGRequest,
  type RAGResponse,
  type RAGResponseStatus,
} from './service';
