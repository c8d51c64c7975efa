/**
 * Model service contracts.
 *
 * Indexing and retrieval only need an Embedder; answering needs a
 * Generator as well. OpenAIAdapter provides both.
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: MessageRole;
  content: string;
}

// =============================================================================
// Generation
// =============================================================================

export interface LLMCompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;  // Set by the timeout wrapper
}

/** null when the service stopped for any other reason. */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

export interface Generator {
  complete(messages: LLMMessage[], options?: LLMCompletionOptions): Promise<LLMCompletionResponse>;
}

// =============================================================================
// Embedding
// =============================================================================

export interface LLMEmbeddingOptions {
  model?: string;
  signal?: AbortSignal;
}

export interface LLMEmbeddingResponse {
  embedding: number[];
  usage: Pick<TokenUsage, 'promptTokens' | 'totalTokens'>;
}

export interface Embedder {
  embed(text: string, options?: LLMEmbeddingOptions): Promise<LLMEmbeddingResponse>;

  /** One response per text, in input order. */
  embedBatch(texts: string[], options?: LLMEmbeddingOptions): Promise<LLMEmbeddingResponse[]>;
}
