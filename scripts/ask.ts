#!/usr/bin/env npx tsx
/**
 * Ask
 *
 * Answers questions about the indexed books, with cited passages.
 * Without a question on the command line it starts an interactive session
 * in which earlier turns are passed along as conversation history.
 *
 * Usage: npm run ask -- [--book <id>]... [question]
 *
 * Options:
 *   --book <id>  Only search this book; repeatable
 */

import * as readline from 'readline';
import { closeDb, createIndexStore } from '@/db';
import { ASK_USAGE, parseAskArgs } from '@/lib/cli/args';
import { loggers } from '@/lib/logger';
import {
  createRAGServiceFromConfig,
  formatSourcesSection,
  isRAGError,
  loadRAGConfig,
  MAX_HISTORY_MESSAGES,
  type RAGService,
} from '@/lib/rag';

const log = loggers.cli.child({ service: 'ask' });

interface HistoryMessage {
  role: 'user' | 'assistant';
  content: string;
}

async function answer(
  service: RAGService,
  question: string,
  books: string[],
  history: HistoryMessage[]
): Promise<string> {
  const response = await service.query({
    question,
    allowedDocuments: books.length > 0 ? books : undefined,
    history,
  });

  const sources = formatSourcesSection(response.citations);
  console.log(`\n${response.answer}\n`);
  if (sources) {
    console.log(`${sources}\n`);
  }
  if (response.status === 'answered') {
    console.log(`(confidence ${(response.confidence * 100).toFixed(0)}%, ${response.timing.total_ms}ms)\n`);
  }

  return response.answer;
}

async function interactive(service: RAGService, books: string[]): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const history: HistoryMessage[] = [];

  const titles = service
    .getSources()
    .filter(source => books.length === 0 || books.includes(source.id))
    .map(source => source.title);
  console.log(`\n📚 Asking about: ${titles.join(', ') || '(no books indexed)'}`);
  console.log('Type a question, or "exit" to quit.\n');

  rl.setPrompt('> ');
  rl.prompt();

  try {
    for await (const line of rl) {
      const question = line.trim();
      if (question === 'exit' || question === 'quit') break;

      if (question) {
        try {
          const reply = await answer(service, question, books, history);
          history.push({ role: 'user', content: question }, { role: 'assistant', content: reply });
          history.splice(0, Math.max(0, history.length - MAX_HISTORY_MESSAGES));
        } catch (error) {
          // Typed pipeline errors end the question, not the session
          if (!isRAGError(error)) throw error;
          console.log(`\n❌ ${error.message}\n`);
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

async function main(argv: string[]): Promise<void> {
  const args = parseAskArgs(argv);
  if (args.help) {
    console.log(ASK_USAGE);
    return;
  }

  const config = loadRAGConfig();
  const service = await createRAGServiceFromConfig(config, createIndexStore(config), log);

  if (args.question) {
    await answer(service, args.question, args.books, []);
  } else {
    await interactive(service, args.books);
  }
}

main(process.argv.slice(2))
  .then(async () => {
    await closeDb();
    process.exit(0);
  })
  .catch(async (error: unknown) => {
    await closeDb();
    if (isRAGError(error)) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('Fatal error:', error);
    }
    process.exit(1);
  });
