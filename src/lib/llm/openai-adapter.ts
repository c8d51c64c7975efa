/**
 * OpenAI Adapter
 *
 * Embeds passages and questions and generates answers through the OpenAI
 * API, or any OpenAI-compatible endpoint given by OPENAI_BASE_URL.
 *
 * SDK-level retries are disabled: retry and timeout policy live in
 * src/lib/rag/resilience.ts, which aborts calls through the request signal.
 */

import OpenAI from 'openai';
import type { RAGConfig } from '@/lib/rag/config';
import { InvalidConfigError, ServiceUnavailableError } from '@/lib/rag/errors';
import type {
  Embedder,
  FinishReason,
  Generator,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  LLMMessage,
} from '@/types/llm';

export const DEFAULT_GENERATION_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface OpenAIAdapterConfig {
  apiKey: string;
  baseUrl?: string;
  generationModel?: string;
  embeddingModel?: string;
}

function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return null;
  }
}

export class OpenAIAdapter implements Embedder, Generator {
  readonly generationModel: string;
  readonly embeddingModel: string;
  private client: OpenAI;

  constructor(config: OpenAIAdapterConfig) {
    this.generationModel = config.generationModel ?? DEFAULT_GENERATION_MODEL;
    this.embeddingModel = config.embeddingModel ?? DEFAULT_EMBEDDING_MODEL;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const response = await this.client.chat.completions.create(
      {
        model: options?.model ?? this.generationModel,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        temperature: options?.temperature ?? 0.3,
        max_tokens: options?.maxTokens ?? 1000,
      },
      { signal: options?.signal }
    );

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      finishReason: mapFinishReason(choice?.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * @throws ServiceUnavailableError (not retryable) when the response holds no vector
   */
  async embed(text: string, options?: LLMEmbeddingOptions): Promise<LLMEmbeddingResponse> {
    const [result] = await this.embedBatch([text], options);
    if (!result) {
      throw new ServiceUnavailableError('embedding', 'Embedding response contained no data', false);
    }
    return result;
  }

  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create(
      { model: options?.model ?? this.embeddingModel, input: texts },
      { signal: options?.signal }
    );

    // Usage is reported per request; split it evenly across texts
    const promptTokens = Math.floor(response.usage.prompt_tokens / texts.length);
    const totalTokens = Math.floor(response.usage.total_tokens / texts.length);

    // The API may return items out of order; index restores input order
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => ({
        embedding: item.embedding,
        usage: { promptTokens, totalTokens },
      }));
  }
}

/**
 * Adapter for the configured models and endpoint.
 *
 * @throws InvalidConfigError when OPENAI_API_KEY is not set
 */
export function createOpenAIAdapter(
  config: Pick<RAGConfig, 'openaiApiKey' | 'openaiBaseUrl' | 'generationModel' | 'embeddingModel'>
): OpenAIAdapter {
  if (!config.openaiApiKey) {
    throw new InvalidConfigError('OPENAI_API_KEY is not set');
  }

  return new OpenAIAdapter({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    generationModel: config.generationModel,
    embeddingModel: config.embeddingModel,
  });
}
