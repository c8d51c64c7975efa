/**
 * LLM module exports.
 */

export type {
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  Embedder,
  Generator,
} from '@/types/llm';

export {
  OpenAIAdapter,
  createOpenAIAdapter,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_EMBEDDING_MODEL,
} from './openai-adapter';
export type { OpenAIAdapterConfig } from './openai-adapter';

export {
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  formatPassage,
  formatPageRange,
  FALLBACK_ANSWER,
  NO_CONTEXT_ANSWER,
} from './prompts';

export type { PromptPassage } from './prompts';

// Prompt text cleaning
export { cleanPromptText, detectSteering, MAX_LENGTHS } from './sanitize';
export type { PromptField } from './sanitize';
