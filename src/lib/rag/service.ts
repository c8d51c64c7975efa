/**
 * RAG Service
 *
 * Orchestrates the complete RAG pipeline:
 * 1. Retrieve relevant passages from the embedding index
 * 2. Fit them into the prompt with citation markers
 * 3. Generate the answer with the LLM
 * 4. Resolve citations back to passages
 *
 * Missing context is an outcome, not a failure: it comes back as a
 * `no_context` response. Every other error propagates typed.
 */

import { z } from 'zod';
import type { DocumentInfo } from '@/types/corpus';
import type { Embedder, Generator } from '@/types/llm';
import { createOpenAIAdapter } from '@/lib/llm/openai-adapter';
import { NO_CONTEXT_ANSWER } from '@/lib/llm/prompts';
import { MAX_LENGTHS } from '@/lib/llm/sanitize';
import {
  createLayerLogger,
  createRequestContext,
  logger,
  logRagStep,
  Timer,
  truncateText,
  type Logger,
} from '@/lib/logger';
import { Retriever, type RetrievalResult } from './retrieval';
import { buildPrompt, type BuiltPrompt } from './prompt-builder';
import { formatAnswer, calculateOverallConfidence, type CitationRef } from './citations';
import { EmbeddingIndex } from './embedding-index';
import type { IndexStore } from './persistence';
import {
  createResilientEmbedder,
  createResilientGenerator,
  resilienceOptionsFromConfig,
} from './resilience';
import { DEFAULT_RAG_CONFIG, MAX_HISTORY_MESSAGES, type RAGConfig } from './config';
import { EmptyIndexError, InvalidInputError, NoContextAvailableError } from './errors';

const log = logger.child({ layer: 'rag', service: 'RAGService' });

// =============================================================================
// Types
// =============================================================================

export const ragRequestSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question must not be empty')
    .max(MAX_LENGTHS.USER_QUESTION, `Question must be at most ${MAX_LENGTHS.USER_QUESTION} characters`),
  topK: z.number().int().positive().optional(),
  contextBudget: z.number().int().positive().optional(),
  allowedDocuments: z.array(z.string().min(1)).optional(),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      })
    )
    .optional(),
});

export type RAGRequest = z.input<typeof ragRequestSchema>;

export type RAGResponseStatus = 'answered' | 'no_context';

export interface RAGResponse {
  status: RAGResponseStatus;
  answer: string;
  citations: CitationRef[];
  confidence: number;
  retrievedChunks: number;
  contextChunks: number;
  unresolvedMarkers: number[];
  tokensUsed: {
    embedding: number;
    completion: number;
  };
  timing: {
    retrieval_ms: number;
    llm_ms: number;
    total_ms: number;
  };
  traceId: string;
}

export type RAGServiceOptions = Pick<
  RAGConfig,
  | 'topK'
  | 'similarityThreshold'
  | 'contextBudget'
  | 'contextUnit'
  | 'answerWithoutContext'
  | 'allowedDocuments'
  | 'embeddingModel'
  | 'generationModel'
  | 'temperature'
  | 'maxTokens'
>;

// =============================================================================
// RAG Service Class
// =============================================================================

export class RAGService {
  private readonly options: RAGServiceOptions;
  private readonly retriever: Retriever;

  constructor(
    private readonly index: EmbeddingIndex,
    embedder: Embedder,
    private readonly generator: Generator,
    options: Partial<RAGServiceOptions> = {}
  ) {
    this.options = { ...DEFAULT_RAG_CONFIG, ...options };
    this.retriever = new Retriever(index, embedder, {
      topK: this.options.topK,
      similarityThreshold: this.options.similarityThreshold,
      embeddingModel: this.options.embeddingModel,
    });
  }

  /**
   * Books available for source selection.
   */
  getSources(): DocumentInfo[] {
    return this.index.documents();
  }

  get corpusVersion(): string {
    return this.index.corpusVersion;
  }

  /**
   * Answer a question from the indexed books.
   *
   * @throws InvalidInputError for an invalid request or an unknown source id
   */
  async query(request: RAGRequest): Promise<RAGResponse> {
    const ctx = createRequestContext({ source: 'rag' });
    const reqLog = createLayerLogger('rag', ctx).child({ service: 'RAGService' });
    const timer = new Timer();

    const parsed = ragRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; ');
      reqLog.warn({ event: 'validation_error', issues }, 'Invalid question');
      throw new InvalidInputError(`Invalid request: ${issues}`, parsed.error);
    }
    const { question, topK, contextBudget, history } = parsed.data;

    const allowedDocuments = parsed.data.allowedDocuments ?? this.options.allowedDocuments;
    if (allowedDocuments) {
      const unknown = allowedDocuments.filter(id => !this.index.hasDocument(id));
      if (unknown.length > 0) {
        throw new InvalidInputError(`Unknown source: ${unknown.join(', ')}`);
      }
    }

    reqLog.info(
      {
        event: 'query_start',
        question: truncateText(question, 100),
        sources: allowedDocuments?.length ?? 'all',
        corpusVersion: this.index.corpusVersion,
      },
      'Question received'
    );

    const noContext = (
      reason: string,
      retrieval: RetrievalResult | null
    ): RAGResponse => {
      reqLog.info(
        { event: 'no_context', reason, duration_ms: timer.elapsed() },
        'No context available for question'
      );
      return {
        status: 'no_context',
        answer: NO_CONTEXT_ANSWER,
        citations: [],
        confidence: 0,
        retrievedChunks: retrieval?.matches.length ?? 0,
        contextChunks: 0,
        unresolvedMarkers: [],
        tokensUsed: { embedding: retrieval?.queryEmbeddingTokens ?? 0, completion: 0 },
        timing: {
          retrieval_ms: timer.getDuration('retrieval') ?? 0,
          llm_ms: 0,
          total_ms: timer.elapsed(),
        },
        traceId: ctx.traceId,
      };
    };

    if (this.index.size === 0) {
      return noContext('empty_index', null);
    }

    // 1. Retrieve
    timer.mark('retrieval');
    let retrieval: RetrievalResult;
    try {
      retrieval = await this.retriever.retrieve({ question, topK, allowedDocuments }, reqLog);
    } catch (error) {
      if (error instanceof EmptyIndexError) {
        timer.measure('retrieval');
        return noContext('empty_index', null);
      }
      throw error;
    }
    timer.measure('retrieval');

    logRagStep(reqLog, 'retrieval', {
      duration_ms: timer.getDuration('retrieval'),
      chunks: retrieval.matches.length,
    });

    if (retrieval.matches.length === 0 && !this.options.answerWithoutContext) {
      return noContext('below_threshold', retrieval);
    }

    // 2. Prompt
    let built: BuiltPrompt;
    try {
      built = buildPrompt(
        { question, history },
        retrieval,
        {
          contextBudget: contextBudget ?? this.options.contextBudget,
          contextUnit: this.options.contextUnit,
          answerWithoutContext: this.options.answerWithoutContext,
          maxHistoryMessages: MAX_HISTORY_MESSAGES,
        },
        reqLog
      );
    } catch (error) {
      if (error instanceof NoContextAvailableError) {
        return noContext('context_budget', retrieval);
      }
      throw error;
    }

    // 3. Generate
    timer.mark('llm');
    const completion = await this.generator.complete(built.messages, {
      model: this.options.generationModel,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });
    timer.measure('llm');

    logRagStep(reqLog, 'generation', {
      duration_ms: timer.getDuration('llm'),
      tokens: completion.usage.totalTokens,
      model: this.options.generationModel,
    });

    // 4. Citations
    const answer = formatAnswer(completion.content, built.context, reqLog);
    const confidence = calculateOverallConfidence(answer.citations);

    if (built.hasContext && answer.citations.length === 0) {
      reqLog.warn(
        { event: 'answer_without_citations', contextChunks: built.included.length },
        'Answer cites no passages'
      );
    }

    const response: RAGResponse = {
      status: built.hasContext ? 'answered' : 'no_context',
      answer: answer.text,
      citations: answer.citations,
      confidence,
      retrievedChunks: retrieval.matches.length,
      contextChunks: built.included.length,
      unresolvedMarkers: answer.unresolvedMarkers,
      tokensUsed: {
        embedding: retrieval.queryEmbeddingTokens,
        completion: completion.usage.totalTokens,
      },
      timing: {
        retrieval_ms: timer.getDuration('retrieval') ?? 0,
        llm_ms: timer.getDuration('llm') ?? 0,
        total_ms: timer.elapsed(),
      },
      traceId: ctx.traceId,
    };

    reqLog.info(
      {
        event: 'query_complete',
        status: response.status,
        citations: response.citations.length,
        confidence,
        finishReason: completion.finishReason,
        duration_ms: response.timing.total_ms,
      },
      'Question answered'
    );

    return response;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createRAGService(
  index: EmbeddingIndex,
  embedder: Embedder,
  generator: Generator,
  options: Partial<RAGServiceOptions> = {}
): RAGService {
  return new RAGService(index, embedder, generator, options);
}

/**
 * Load the saved index and wire the OpenAI adapter behind timeout and retry.
 *
 * @throws InvalidConfigError when the API key is missing or the snapshot is invalid
 */
export async function createRAGServiceFromConfig(
  config: RAGConfig,
  store: IndexStore,
  serviceLog: Logger = log
): Promise<RAGService> {
  const adapter = createOpenAIAdapter(config);
  const resilience = resilienceOptionsFromConfig(config);

  const snapshot = await store.load();
  let index: EmbeddingIndex;
  if (snapshot) {
    index = EmbeddingIndex.fromSnapshot(snapshot);
    if (snapshot.embeddingModel && snapshot.embeddingModel !== config.embeddingModel) {
      serviceLog.warn(
        {
          event: 'embedding_model_mismatch',
          indexModel: snapshot.embeddingModel,
          configuredModel: config.embeddingModel,
        },
        'Index was built with a different embedding model; rebuild it before querying'
      );
    }
  } else {
    serviceLog.warn({ event: 'index_missing' }, 'No saved index; every question will get no context');
    index = new EmbeddingIndex({ embeddingModel: config.embeddingModel });
  }

  serviceLog.info(
    {
      event: 'service_ready',
      documents: index.documents().length,
      chunks: index.size,
      corpusVersion: index.corpusVersion,
    },
    'RAG service ready'
  );

  return new RAGService(
    index,
    createResilientEmbedder(adapter, resilience),
    createResilientGenerator(adapter, resilience),
    config
  );
}
