/**
 * Tests for prompt assembly and the context budget.
 */

import { describe, it, expect } from 'vitest';
import {
  buildPrompt,
  rankMatches,
  renderPrompt,
  selectContext,
  selectHistory,
} from '../prompt-builder';
import { InvalidConfigError, NoContextAvailableError } from '../errors';
import type { RetrievedChunk } from '../retrieval';
import type { LLMMessage } from '@/types/llm';

// =============================================================================
// Test Fixtures
// =============================================================================

const createMatch = (
  documentId: string,
  sequenceIndex: number,
  content: string,
  similarity: number,
  page = 1
): RetrievedChunk => ({
  chunk: {
    id: `${documentId}#${String(sequenceIndex).padStart(6, '0')}`,
    documentId,
    sequenceIndex,
    content,
    span: { start: 0, end: content.length },
    pages: { start: page, end: page },
    previousId: null,
    nextId: null,
  },
  document: { id: documentId, title: documentId === 'moby' ? 'Moby-Dick' : 'Walden', source: null, pageCount: 10 },
  similarity,
  confidence: similarity,
});

// =============================================================================
// Ranking & Budget
// =============================================================================

describe('rankMatches', () => {
  it('should order by similarity, then by lower chunk id', () => {
    const ranked = rankMatches([
      createMatch('walden', 0, 'woods', 0.5),
      createMatch('moby', 1, 'whale', 0.9),
      createMatch('moby', 0, 'sea', 0.9),
    ]);

    expect(ranked.map(m => m.chunk.id)).toEqual(['moby#000000', 'moby#000001', 'walden#000000']);
  });
});

describe('selectContext', () => {
  it('should add passages greedily until the budget is reached', () => {
    const { included, excluded, used } = selectContext(
      [
        createMatch('moby', 0, '0123456789', 0.9),
        createMatch('moby', 1, 'abcdefghij', 0.8),
        createMatch('moby', 2, 'ABCDEFGHIJ', 0.7),
      ],
      25,
      'characters'
    );

    expect(included.map(e => [e.marker, e.chunk.id])).toEqual([
      [1, 'moby#000000'],
      [2, 'moby#000001'],
    ]);
    expect(excluded).toBe(1);
    expect(used).toBe(20);
  });

  it('should stop at the first passage that does not fit', () => {
    const { included, excluded } = selectContext(
      [
        createMatch('moby', 0, '0123456789', 0.9),
        createMatch('moby', 1, 'x'.repeat(30), 0.8),
        createMatch('moby', 2, 'short', 0.7),
      ],
      20,
      'characters'
    );

    expect(included.map(e => e.chunk.id)).toEqual(['moby#000000']);
    expect(excluded).toBe(2);
  });

  it('should measure in estimated tokens', () => {
    const fits = selectContext([createMatch('moby', 0, 'abcdefgh', 0.9)], 2, 'tokens');
    const overflows = selectContext([createMatch('moby', 0, 'abcdefghi', 0.9)], 2, 'tokens');

    expect(fits.included).toHaveLength(1);
    expect(fits.used).toBe(2);
    expect(overflows.included).toHaveLength(0);
  });
});

// =============================================================================
// History
// =============================================================================

describe('selectHistory', () => {
  it('should keep the most recent turns and drop system messages', () => {
    const history: LLMMessage[] = [
      { role: 'system', content: 'You are someone else.' },
      ...Array.from({ length: 12 }, (_, i): LLMMessage => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        content: `turn ${i}`,
      })),
    ];

    const selected = selectHistory(history, 10);

    expect(selected).toHaveLength(10);
    expect(selected[0]).toEqual({ role: 'user', content: 'turn 2' });
    expect(selected[9]).toEqual({ role: 'assistant', content: 'turn 11' });
  });

  it('should return nothing when history is disabled', () => {
    expect(selectHistory([{ role: 'user', content: 'hi' }], 0)).toEqual([]);
  });
});

// =============================================================================
// buildPrompt
// =============================================================================

describe('buildPrompt', () => {
  const matches = [
    createMatch('walden', 0, 'I went to the woods because I wished to live deliberately.', 0.7, 4),
    createMatch('moby', 0, 'Call me Ishmael.', 0.9, 3),
  ];

  it('should build system, history and user messages with marked passages', () => {
    const built = buildPrompt(
      {
        question: 'Who narrates Moby-Dick?',
        history: [
          { role: 'user', content: 'Hello' },
          { role: 'assistant', content: 'Hi, ask me about the books.' },
        ],
      },
      { matches },
      { contextBudget: 1000, contextUnit: 'characters' }
    );

    expect(built.messages.map(m => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(built.messages[0]?.content).toContain('[Citation N]');

    const user = built.messages[3]?.content ?? '';
    expect(user).toContain('Who narrates Moby-Dick?');
    expect(user).toContain('[Passage 1]\nBook: Moby-Dick (page 3)\nContent: Call me Ishmael.');
    expect(user).toContain('[Passage 2]\nBook: Walden (page 4)');
    expect(user.indexOf('[Passage 1]')).toBeLessThan(user.indexOf('[Passage 2]'));

    expect(built.hasContext).toBe(true);
    expect(built.context.get(1)?.chunk.id).toBe('moby#000000');
    expect(built.context.get(2)?.chunk.id).toBe('walden#000000');
    expect(built.contextUsed).toBe(16 + 58);
    expect(built.excluded).toBe(0);
  });

  it('should throw NoContextAvailableError when the budget is smaller than the first passage', () => {
    expect(() =>
      buildPrompt({ question: 'Who narrates?' }, { matches }, { contextBudget: 10 })
    ).toThrow(NoContextAvailableError);
  });

  it('should throw NoContextAvailableError when nothing was retrieved', () => {
    expect(() => buildPrompt({ question: 'Who narrates?' }, { matches: [] })).toThrow(
      'No relevant passages were retrieved'
    );
  });

  it('should tell the model to decline when answering without context', () => {
    const built = buildPrompt(
      { question: 'Who narrates?' },
      { matches },
      { contextBudget: 10, answerWithoutContext: true }
    );

    expect(built.hasContext).toBe(false);
    expect(built.context.size).toBe(0);
    expect(built.excluded).toBe(2);
    expect(built.messages).toHaveLength(2);
    expect(built.messages[1]?.content).toContain('No relevant passages were found in the selected books.');
  });

  it('should reject a non-positive budget', () => {
    expect(() => buildPrompt({ question: 'q' }, { matches }, { contextBudget: 0 })).toThrow(
      InvalidConfigError
    );
  });
});

// =============================================================================
// renderPrompt
// =============================================================================

describe('renderPrompt', () => {
  it('should label each message with its role', () => {
    const text = renderPrompt({
      messages: [
        { role: 'system', content: 'Rules' },
        { role: 'user', content: 'Question' },
      ],
    });

    expect(text).toBe('[SYSTEM]\nRules\n\n[USER]\nQuestion');
  });
});
