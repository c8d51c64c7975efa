/**
 * Command-line argument parsing for the build-index and ask scripts.
 */

import { InvalidInputError } from '@/lib/rag/errors';

export const BUILD_INDEX_USAGE = 'Usage: npm run index:build -- [--fresh] [--book <id>]...';
export const ASK_USAGE = 'Usage: npm run ask -- [--book <id>]... [question]';

export interface BuildIndexArgs {
  fresh: boolean;     // Ignore the saved index and embed every book again
  books: string[];    // Only (re)index these books
  help: boolean;
}

export interface AskArgs {
  books: string[];            // Source filter
  question: string | null;    // One-shot question; interactive when null
  help: boolean;
}

/**
 * Read the value of `--book <id>` or `--book=<id>`.
 * Returns the value and how many argv entries it consumed.
 */
function readBookValue(argv: string[], i: number, usage: string): [string, number] {
  const arg = argv[i];
  const inline = arg.startsWith('--book=') ? arg.slice('--book='.length) : null;
  const value = inline ?? argv[i + 1];

  if (value === undefined || value.trim() === '' || (inline === null && value.startsWith('--'))) {
    throw new InvalidInputError(`--book needs a book id. ${usage}`);
  }
  return [value.trim(), inline === null ? 2 : 1];
}

function isBookFlag(arg: string): boolean {
  return arg === '--book' || arg.startsWith('--book=');
}

export function parseBuildIndexArgs(argv: string[]): BuildIndexArgs {
  const args: BuildIndexArgs = { fresh: false, books: [], help: false };

  for (let i = 0; i < argv.length; ) {
    const arg = argv[i];

    if (isBookFlag(arg)) {
      const [book, consumed] = readBookValue(argv, i, BUILD_INDEX_USAGE);
      args.books.push(book);
      i += consumed;
      continue;
    }

    if (arg === '--fresh') {
      args.fresh = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else {
      throw new InvalidInputError(`Unknown argument: ${arg}. ${BUILD_INDEX_USAGE}`);
    }
    i += 1;
  }

  return args;
}

export function parseAskArgs(argv: string[]): AskArgs {
  const books: string[] = [];
  const words: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; ) {
    const arg = argv[i];

    if (isBookFlag(arg)) {
      const [book, consumed] = readBookValue(argv, i, ASK_USAGE);
      books.push(book);
      i += consumed;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('--')) {
      throw new InvalidInputError(`Unknown argument: ${arg}. ${ASK_USAGE}`);
    } else {
      words.push(arg);
    }
    i += 1;
  }

  const question = words.join(' ').trim();
  return { books, question: question.length > 0 ? question : null, help };
}
