/**
 * Prompt Builder
 *
 * Ranks retrieved passages, fits them into the context budget, tags each
 * with a citation marker and assembles the chat messages for generation.
 */

import type { Chunk, DocumentInfo } from '@/types/corpus';
import type { LLMMessage } from '@/types/llm';
import { logger, logRagStep, type Logger } from '@/lib/logger';
import { buildRAGSystemPrompt, buildRAGUserPrompt } from '@/lib/llm/prompts';
import { cleanPromptText } from '@/lib/llm/sanitize';
import { estimateTokens } from './chunker';
import { compareMatches } from './embedding-index';
import {
  DEFAULT_CONTEXT_BUDGET,
  DEFAULT_CONTEXT_UNIT,
  MAX_HISTORY_MESSAGES,
  type ContextUnit,
} from './config';
import { InvalidConfigError, NoContextAvailableError } from './errors';
import type { RetrievedChunk } from './retrieval';

const defaultLog = logger.child({ layer: 'rag', service: 'PromptBuilder' });

// =============================================================================
// Types
// =============================================================================

/**
 * A passage included in the prompt under its citation marker.
 */
export interface ContextEntry {
  marker: number;
  chunk: Chunk;
  document: DocumentInfo;
  similarity: number;
  confidence: number;
  cost: number;
}

/**
 * Marker number to the passage it labels.
 */
export type CitationContext = ReadonlyMap<number, ContextEntry>;

export interface PromptQuery {
  question: string;
  history?: LLMMessage[];
}

export interface PromptOptions {
  contextBudget: number;
  contextUnit: ContextUnit;
  answerWithoutContext: boolean;
  maxHistoryMessages: number;
}

export interface BuiltPrompt {
  messages: LLMMessage[];
  context: CitationContext;
  included: ContextEntry[];
  excluded: number;
  contextUsed: number;
  hasContext: boolean;
}

const DEFAULT_PROMPT_OPTIONS: PromptOptions = {
  contextBudget: DEFAULT_CONTEXT_BUDGET,
  contextUnit: DEFAULT_CONTEXT_UNIT,
  answerWithoutContext: false,
  maxHistoryMessages: MAX_HISTORY_MESSAGES,
};

// =============================================================================
// Ranking & Budget
// =============================================================================

/**
 * Descending similarity, ties broken by lower chunk id.
 */
export function rankMatches(matches: RetrievedChunk[]): RetrievedChunk[] {
  return [...matches].sort(compareMatches);
}

/**
 * Size of a text in the budget's unit.
 */
export function measureText(text: string, unit: ContextUnit): number {
  return unit === 'tokens' ? estimateTokens(text) : text.length;
}

/**
 * Take passages in rank order while they fit. The first passage that does
 * not fit ends the selection; passages are never truncated.
 */
export function selectContext(
  matches: RetrievedChunk[],
  budget: number,
  unit: ContextUnit
): { included: ContextEntry[]; excluded: number; used: number } {
  const ranked = rankMatches(matches);
  const included: ContextEntry[] = [];
  let used = 0;

  for (const match of ranked) {
    const cost = measureText(match.chunk.content, unit);
    if (used + cost > budget) break;
    used += cost;
    included.push({
      marker: included.length + 1,
      chunk: match.chunk,
      document: match.document,
      similarity: match.similarity,
      confidence: match.confidence,
      cost,
    });
  }

  return { included, excluded: ranked.length - included.length, used };
}

// =============================================================================
// Prompt Assembly
// =============================================================================

/**
 * Prior turns kept for the prompt: the most recent user/assistant messages.
 */
export function selectHistory(history: LLMMessage[], maxMessages: number): LLMMessage[] {
  if (maxMessages <= 0) return [];
  return history
    .filter(message => message.role !== 'system')
    .slice(-maxMessages)
    .map(message => ({ role: message.role, content: cleanPromptText(message.content, 'history') }));
}

/**
 * Build the chat messages for a question and its retrieved passages.
 *
 * @throws NoContextAvailableError when no passage fits and answering
 *         without context is disabled
 */
export function buildPrompt(
  query: PromptQuery,
  retrieval: { matches: RetrievedChunk[] },
  options: Partial<PromptOptions> = {},
  log: Logger = defaultLog
): BuiltPrompt {
  const opts = { ...DEFAULT_PROMPT_OPTIONS, ...options };

  if (!Number.isFinite(opts.contextBudget) || opts.contextBudget <= 0) {
    throw new InvalidConfigError(`contextBudget must be positive, got ${opts.contextBudget}`);
  }

  const { included, excluded, used } = selectContext(
    retrieval.matches,
    opts.contextBudget,
    opts.contextUnit
  );

  if (included.length === 0 && !opts.answerWithoutContext) {
    log.info(
      {
        event: 'no_context_available',
        candidates: retrieval.matches.length,
        budget: opts.contextBudget,
        unit: opts.contextUnit,
      },
      'No passage fits into the prompt context'
    );
    throw new NoContextAvailableError(
      retrieval.matches.length === 0
        ? 'No relevant passages were retrieved'
        : `No passage fits into a context budget of ${opts.contextBudget} ${opts.contextUnit}`
    );
  }

  const messages: LLMMessage[] = [
    { role: 'system', content: buildRAGSystemPrompt() },
    ...selectHistory(query.history ?? [], opts.maxHistoryMessages),
    {
      role: 'user',
      content: buildRAGUserPrompt(
        query.question,
        included.map(entry => ({
          marker: entry.marker,
          title: entry.document.title,
          pages: entry.chunk.pages,
          content: entry.chunk.content,
        }))
      ),
    },
  ];

  logRagStep(log, 'prompt', {
    chunks: included.length,
    tokens: messages.reduce((sum, m) => sum + estimateTokens(m.content), 0),
  });
  if (excluded > 0) {
    log.debug(
      { event: 'context_budget_exceeded', included: included.length, excluded, used, budget: opts.contextBudget },
      'Passages dropped to fit the context budget'
    );
  }

  return {
    messages,
    context: new Map(included.map(entry => [entry.marker, entry])),
    included,
    excluded,
    contextUsed: used,
    hasContext: included.length > 0,
  };
}

/**
 * Flatten a prompt into one text for logging and debugging.
 */
export function renderPrompt(built: Pick<BuiltPrompt, 'messages'>): string {
  return built.messages
    .map(message => `[${message.role.toUpperCase()}]\n${message.content}`)
    .join('\n\n');
}
