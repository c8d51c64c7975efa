/**
 * RAG Configuration
 *
 * Centralized defaults for the pipeline, and the environment loader that
 * turns process.env into a validated RAGConfig.
 */

import { z } from 'zod';
import { DEFAULT_EMBEDDING_MODEL, DEFAULT_GENERATION_MODEL } from '@/lib/llm/openai-adapter';
import { InvalidConfigError } from './errors';

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Default number of chunks to retrieve from the index.
 */
export const DEFAULT_TOP_K = 20;

/**
 * Matches with cosine similarity below this are dropped before prompting.
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.2;

/**
 * Default prompt context budget, in the unit given by DEFAULT_CONTEXT_UNIT.
 */
export const DEFAULT_CONTEXT_BUDGET = 12000;

export const DEFAULT_CONTEXT_UNIT = 'characters';

/**
 * Prior conversation turns passed to the model at most.
 */
export const MAX_HISTORY_MESSAGES = 10;

// =============================================================================
// Similarity-to-Confidence Mapping
// =============================================================================

export const SIMILARITY_TIER_VERY_HIGH = 0.9;
export const SIMILARITY_TIER_HIGH = 0.8;
export const SIMILARITY_TIER_MEDIUM = 0.7;

export const SIMILARITY_CONFIDENCE_VERY_HIGH_BASE = 0.95;
export const SIMILARITY_CONFIDENCE_VERY_HIGH_MULT = 0.5;
export const SIMILARITY_CONFIDENCE_HIGH_BASE = 0.85;
export const SIMILARITY_CONFIDENCE_HIGH_MULT = 1.0;
export const SIMILARITY_CONFIDENCE_MEDIUM_BASE = 0.70;
export const SIMILARITY_CONFIDENCE_MEDIUM_MULT = 1.5;

/**
 * Multiplier for low similarity tier (below medium threshold).
 */
export const SIMILARITY_CONFIDENCE_LOW_MULT = 0.9;

/**
 * Threshold for "high" confidence label.
 */
export const CONFIDENCE_LABEL_HIGH_THRESHOLD = 0.8;

/**
 * Threshold for "medium" confidence label.
 */
export const CONFIDENCE_LABEL_MEDIUM_THRESHOLD = 0.6;

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size in characters for document splitting.
 */
export const DEFAULT_CHUNK_SIZE = 600;

/**
 * Default overlap between chunks in characters.
 * Helps maintain context across chunk boundaries.
 */
export const DEFAULT_CHUNK_OVERLAP = 100;

/**
 * How far back from the target end the chunker looks for a natural break.
 */
export const DEFAULT_BOUNDARY_WINDOW = 100;

// =============================================================================
// Ingestion Configuration
// =============================================================================

/**
 * Texts sent per embedding request.
 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

/**
 * Documents chunked and embedded in parallel.
 */
export const DEFAULT_INGEST_CONCURRENCY = 3;

// =============================================================================
// LLM Configuration
// =============================================================================

/**
 * Default max tokens for answer generation.
 */
export const DEFAULT_RAG_MAX_TOKENS = 1024;

/**
 * Default temperature for answer generation.
 * Lower values = more focused/deterministic responses.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.3;

// =============================================================================
// Resilience Configuration
// =============================================================================

export const DEFAULT_SERVICE_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RETRY_MAX_DELAY_MS = 8000;

// =============================================================================
// Storage Configuration
// =============================================================================

export const DEFAULT_INDEX_PATH = 'data/index.json';
export const DEFAULT_INDEX_NAME = 'default';
export const DEFAULT_CORPUS_MANIFEST = 'corpus.json';

// =============================================================================
// Environment Loader
// =============================================================================

export type ContextUnit = 'characters' | 'tokens';
export type IndexStoreKind = 'file' | 'postgres';

export interface RAGConfig {
  topK: number;
  similarityThreshold: number;
  contextBudget: number;
  contextUnit: ContextUnit;
  answerWithoutContext: boolean;
  chunkSize: number;
  chunkOverlap: number;
  allowedDocuments?: string[];
  embeddingBatchSize: number;
  ingestConcurrency: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  embeddingModel: string;
  generationModel: string;
  temperature: number;
  maxTokens: number;
  serviceTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  indexStore: IndexStoreKind;
  indexPath: string;
  indexName: string;
  databaseUrl?: string;
  corpusManifest: string;
}

const booleanFlag = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform(v => v === 'true');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z
  .object({
    RAG_TOP_K: positiveInt(DEFAULT_TOP_K),
    RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),
    RAG_CONTEXT_BUDGET: positiveInt(DEFAULT_CONTEXT_BUDGET),
    RAG_CONTEXT_UNIT: z.enum(['characters', 'tokens']).default(DEFAULT_CONTEXT_UNIT),
    RAG_ANSWER_WITHOUT_CONTEXT: booleanFlag(false),
    RAG_CHUNK_SIZE: positiveInt(DEFAULT_CHUNK_SIZE),
    RAG_CHUNK_OVERLAP: nonNegativeInt(DEFAULT_CHUNK_OVERLAP),
    RAG_ALLOWED_DOCUMENTS: z.string().optional(),
    RAG_EMBEDDING_BATCH_SIZE: positiveInt(DEFAULT_EMBEDDING_BATCH_SIZE),
    RAG_INGEST_CONCURRENCY: positiveInt(DEFAULT_INGEST_CONCURRENCY),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z.string().default(DEFAULT_EMBEDDING_MODEL),
    GENERATION_MODEL: z.string().default(DEFAULT_GENERATION_MODEL),
    RAG_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_RAG_TEMPERATURE),
    RAG_MAX_TOKENS: positiveInt(DEFAULT_RAG_MAX_TOKENS),
    SERVICE_TIMEOUT_MS: positiveInt(DEFAULT_SERVICE_TIMEOUT_MS),
    SERVICE_MAX_RETRIES: nonNegativeInt(DEFAULT_MAX_RETRIES),
    RETRY_BASE_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_BASE_DELAY_MS),
    RETRY_MAX_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_MAX_DELAY_MS),
    INDEX_STORE: z.enum(['file', 'postgres']).default('file'),
    INDEX_PATH: z.string().default(DEFAULT_INDEX_PATH),
    INDEX_NAME: z.string().default(DEFAULT_INDEX_NAME),
    DATABASE_URL: z.string().optional(),
    CORPUS_MANIFEST: z.string().default(DEFAULT_CORPUS_MANIFEST),
  })
  .refine(env => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
    message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
    path: ['RAG_CHUNK_OVERLAP'],
  })
  .refine(env => env.RETRY_BASE_DELAY_MS <= env.RETRY_MAX_DELAY_MS, {
    message: 'RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS',
    path: ['RETRY_BASE_DELAY_MS'],
  })
  .refine(env => env.INDEX_STORE !== 'postgres' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required when INDEX_STORE=postgres',
    path: ['DATABASE_URL'],
  });

/**
 * Parse a comma-separated list of document ids.
 */
export function parseDocumentList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const ids = value.split(',').map(id => id.trim()).filter(id => id.length > 0);
  return ids.length > 0 ? ids : undefined;
}

/**
 * Load pipeline configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws InvalidConfigError listing every invalid variable
 */
export function loadRAGConfig(env: NodeJS.ProcessEnv = process.env): RAGConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid configuration: ${issues}`, result.error);
  }

  const e = result.data;
  return {
    topK: e.RAG_TOP_K,
    similarityThreshold: e.RAG_SIMILARITY_THRESHOLD,
    contextBudget: e.RAG_CONTEXT_BUDGET,
    contextUnit: e.RAG_CONTEXT_UNIT,
    answerWithoutContext: e.RAG_ANSWER_WITHOUT_CONTEXT,
    chunkSize: e.RAG_CHUNK_SIZE,
    chunkOverlap: e.RAG_CHUNK_OVERLAP,
    allowedDocuments: parseDocumentList(e.RAG_ALLOWED_DOCUMENTS),
    embeddingBatchSize: e.RAG_EMBEDDING_BATCH_SIZE,
    ingestConcurrency: e.RAG_INGEST_CONCURRENCY,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiBaseUrl: e.OPENAI_BASE_URL,
    embeddingModel: e.EMBEDDING_MODEL,
    generationModel: e.GENERATION_MODEL,
    temperature: e.RAG_TEMPERATURE,
    maxTokens: e.RAG_MAX_TOKENS,
    serviceTimeoutMs: e.SERVICE_TIMEOUT_MS,
    maxRetries: e.SERVICE_MAX_RETRIES,
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: e.RETRY_MAX_DELAY_MS,
    indexStore: e.INDEX_STORE,
    indexPath: e.INDEX_PATH,
    indexName: e.INDEX_NAME,
    databaseUrl: e.DATABASE_URL,
    corpusManifest: e.CORPUS_MANIFEST,
  };
}

// =============================================================================
// Composite Default Config
// =============================================================================

/**
 * Configuration with every default applied.
 */
export const DEFAULT_RAG_CONFIG: RAGConfig = loadRAGConfig({});
