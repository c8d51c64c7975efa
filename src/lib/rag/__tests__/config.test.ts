/**
 * Tests for RAG Configuration
 *
 * Verifies defaults and environment variable parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  loadRAGConfig,
  parseDocumentList,
  DEFAULT_RAG_CONFIG,
  DEFAULT_TOP_K,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from '../config';
import { InvalidConfigError } from '../errors';

// =============================================================================
// Default Values Tests
// =============================================================================

describe('RAG config defaults', () => {
  it('should use the corpus defaults', () => {
    expect(DEFAULT_TOP_K).toBe(20);
    expect(DEFAULT_CHUNK_SIZE).toBe(600);
    expect(DEFAULT_CHUNK_OVERLAP).toBe(100);
  });

  it('should build a complete default config from an empty environment', () => {
    expect(DEFAULT_RAG_CONFIG).toEqual({
      topK: 20,
      similarityThreshold: 0.2,
      contextBudget: 12000,
      contextUnit: 'characters',
      answerWithoutContext: false,
      chunkSize: 600,
      chunkOverlap: 100,
      allowedDocuments: undefined,
      embeddingBatchSize: 64,
      ingestConcurrency: 3,
      openaiApiKey: undefined,
      openaiBaseUrl: undefined,
      embeddingModel: 'text-embedding-3-small',
      generationModel: 'gpt-4o-mini',
      temperature: 0.3,
      maxTokens: 1024,
      serviceTimeoutMs: 30000,
      maxRetries: 3,
      retryBaseDelayMs: 500,
      retryMaxDelayMs: 8000,
      indexStore: 'file',
      indexPath: 'data/index.json',
      indexName: 'default',
      databaseUrl: undefined,
      corpusManifest: 'corpus.json',
    });
  });
});

// =============================================================================
// Environment Parsing Tests
// =============================================================================

describe('loadRAGConfig', () => {
  it('should coerce numbers and booleans', () => {
    const config = loadRAGConfig({
      RAG_TOP_K: '5',
      RAG_SIMILARITY_THRESHOLD: '0.35',
      RAG_CONTEXT_BUDGET: '800',
      RAG_CONTEXT_UNIT: 'tokens',
      RAG_ANSWER_WITHOUT_CONTEXT: 'true',
      SERVICE_MAX_RETRIES: '0',
    });

    expect(config.topK).toBe(5);
    expect(config.similarityThreshold).toBe(0.35);
    expect(config.contextBudget).toBe(800);
    expect(config.contextUnit).toBe('tokens');
    expect(config.answerWithoutContext).toBe(true);
    expect(config.maxRetries).toBe(0);
  });

  it('should treat empty variables as unset', () => {
    const config = loadRAGConfig({ RAG_TOP_K: '', OPENAI_BASE_URL: '' });

    expect(config.topK).toBe(20);
    expect(config.openaiBaseUrl).toBeUndefined();
  });

  it('should parse the allowed documents list', () => {
    const config = loadRAGConfig({ RAG_ALLOWED_DOCUMENTS: 'moby-dick, frankenstein ,' });

    expect(config.allowedDocuments).toEqual(['moby-dick', 'frankenstein']);
  });

  it('should reject overlap not smaller than chunk size', () => {
    expect(() =>
      loadRAGConfig({ RAG_CHUNK_SIZE: '100', RAG_CHUNK_OVERLAP: '100' })
    ).toThrow(InvalidConfigError);
  });

  it('should reject non-numeric values and name the variable', () => {
    expect(() => loadRAGConfig({ RAG_TOP_K: 'many' })).toThrow(/RAG_TOP_K/);
  });

  it('should reject an unknown boolean spelling', () => {
    expect(() => loadRAGConfig({ RAG_ANSWER_WITHOUT_CONTEXT: 'yes' })).toThrow(InvalidConfigError);
  });

  it('should require DATABASE_URL for the postgres store', () => {
    expect(() => loadRAGConfig({ INDEX_STORE: 'postgres' })).toThrow(/DATABASE_URL/);

    const config = loadRAGConfig({
      INDEX_STORE: 'postgres',
      DATABASE_URL: 'postgres://localhost:5432/books',
    });
    expect(config.indexStore).toBe('postgres');
  });
});

describe('parseDocumentList', () => {
  it('should return undefined for missing or blank input', () => {
    expect(parseDocumentList(undefined)).toBeUndefined();
    expect(parseDocumentList(' , ')).toBeUndefined();
  });
});
