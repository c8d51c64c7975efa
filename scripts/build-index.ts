#!/usr/bin/env npx tsx
/**
 * Build Index
 *
 * Extracts the books listed in the corpus manifest, embeds their chunks
 * and saves the index (INDEX_STORE=file by default, or postgres).
 *
 * Usage: npm run index:build -- [--fresh] [--book <id>]...
 *
 * Options:
 *   --fresh      Ignore the saved index and embed every selected book again
 *   --book <id>  Only (re)index this book; repeatable
 */

import { closeDb, createIndexStore } from '@/db';
import { buildIndex } from '@/lib/corpus/build-index';
import { loadCorpusFromManifest } from '@/lib/corpus/manifest';
import { BUILD_INDEX_USAGE, parseBuildIndexArgs } from '@/lib/cli/args';
import { createOpenAIAdapter } from '@/lib/llm';
import { loggers } from '@/lib/logger';
import {
  createResilientEmbedder,
  isRAGError,
  loadRAGConfig,
  resilienceOptionsFromConfig,
} from '@/lib/rag';

const log = loggers.cli.child({ service: 'build-index' });

async function main(argv: string[]): Promise<number> {
  const args = parseBuildIndexArgs(argv);
  if (args.help) {
    console.log(BUILD_INDEX_USAGE);
    return 0;
  }

  const config = loadRAGConfig();
  const store = createIndexStore(config);

  console.log(`\n📚 Loading corpus from ${config.corpusManifest}\n`);
  const corpus = await loadCorpusFromManifest(config.corpusManifest, log);

  for (const book of corpus.missing) {
    console.log(`⚠️  Missing file for "${book.title}": ${book.file}`);
  }
  for (const book of corpus.failed) {
    console.log(`❌ Could not read "${book.title}": ${book.error}`);
  }

  const adapter = createOpenAIAdapter(config);
  const embedder = createResilientEmbedder(adapter, {
    ...resilienceOptionsFromConfig(config),
    logger: log,
  });

  const result = await buildIndex(corpus, store, embedder, config, args, log);

  for (const doc of result.report.indexed) {
    console.log(`✅ ${doc.title}: ${doc.chunks} chunks (${doc.duration_ms}ms)`);
  }
  for (const doc of result.report.failed) {
    console.log(`❌ ${doc.documentId}: ${doc.error}`);
  }
  for (const id of result.removed) {
    console.log(`🗑️  Removed ${id}`);
  }

  console.log(
    `\nIndex saved: ${result.documents} books, ${result.chunks} chunks, ` +
    `version ${result.report.corpusVersion.slice(0, 12)}\n`
  );

  return result.report.failed.length > 0 || corpus.failed.length > 0 ? 1 : 0;
}

main(process.argv.slice(2))
  .then(async (code) => {
    await closeDb();
    process.exit(code);
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
