/**
 * Database module exports.
 */

import type { RAGConfig } from '@/lib/rag/config';
import { FileIndexStore, type IndexStore } from '@/lib/rag/persistence';
import { getDb } from './client';
import { PostgresIndexStore } from './pg-index-store';

// Database client
export { getDb, closeDb } from './client';
export type { Database } from './client';

// Index store
export { PostgresIndexStore, snapshotToRows, rowsToSnapshot } from './pg-index-store';

// Schemas
export * from './schema';

/**
 * Index store selected by INDEX_STORE.
 */
export function createIndexStore(
  config: Pick<RAGConfig, 'indexStore' | 'indexPath' | 'indexName' | 'databaseUrl'>
): IndexStore {
  if (config.indexStore === 'postgres') {
    return new PostgresIndexStore(getDb(config.databaseUrl), config.indexName);
  }
  return new FileIndexStore(config.indexPath);
}
