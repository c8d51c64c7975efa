/**
 * Prompt Text Cleaning
 *
 * Questions, passages, titles and history turns are untrusted: a book can
 * contain any text at all. Each is cleaned before it goes between the
 * prompt's <<<SECTION>>> markers so that it cannot open or close a section.
 */

import { logger, truncateText as truncateForLog } from '@/lib/logger';

const log = logger.child({ layer: 'llm', service: 'sanitize' });

export const MAX_LENGTHS = {
  USER_QUESTION: 2000,
  PASSAGE: 10000,
  TITLE: 300,
  HISTORY_MESSAGE: 4000,
} as const;

export type PromptField = 'question' | 'passage' | 'title' | 'history';

const FIELD_LIMITS: Record<PromptField, number> = {
  question: MAX_LENGTHS.USER_QUESTION,
  passage: MAX_LENGTHS.PASSAGE,
  title: MAX_LENGTHS.TITLE,
  history: MAX_LENGTHS.HISTORY_MESSAGE,
};

const MARKER_RUN = /<{3,}|>{3,}/g;
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
const BLANK_RUN = /[ \t]{10,}/g;
const NEWLINE_RUN = /\n{5,}/g;

// Questions that address the model instead of asking about the books
const STEERING_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'override', pattern: /\b(ignore|disregard|forget)\s+(all\s+)?(the\s+)?(previous|prior|above|your)\s+(instructions?|rules?|passages?)/i },
  { name: 'prompt_extraction', pattern: /\b(reveal|print|show|repeat)\s+(me\s+)?(your|the)\s+(system\s+)?(prompt|instructions)/i },
  { name: 'role_change', pattern: /\byou\s+are\s+(now|actually)\s+(a|an|the)\b/i },
  { name: 'section_marker', pattern: /<<<\s*\/?\s*(system|end|user|retrieved)/i },
];

/**
 * Names of the steering patterns found in a question.
 */
export function detectSteering(text: string): string[] {
  return STEERING_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ name }) => name);
}

/**
 * Space out runs of three or more angle brackets: `<<<X>>>` becomes `< < <X> > >`.
 */
export function neutralizeMarkers(text: string): string {
  return text.replace(MARKER_RUN, run => run.split('').join(' '));
}

/**
 * Cut text to `maxLength`, at a word boundary when one is close, and mark the cut.
 */
export function clipText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const head = text.slice(0, maxLength);
  const lastSpace = head.lastIndexOf(' ');
  return `${lastSpace > maxLength * 0.8 ? head.slice(0, lastSpace) : head}...`;
}

/**
 * Clean untrusted text for one prompt field.
 * Steering attempts in questions are logged, not removed.
 */
export function cleanPromptText(text: string, field: PromptField): string {
  const trimmed = text.trim();

  if (field === 'question') {
    const patterns = detectSteering(trimmed);
    if (patterns.length > 0) {
      log.warn(
        { event: 'steering_question', patterns, question: truncateForLog(trimmed, 100) },
        'Question tries to steer the model'
      );
    }
  }

  const cleaned = neutralizeMarkers(trimmed)
    .replace(CONTROL_CHARS, '')
    .replace(BLANK_RUN, '    ')
    .replace(NEWLINE_RUN, '\n\n\n');

  return clipText(cleaned, FIELD_LIMITS[field]);
}
