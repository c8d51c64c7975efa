/**
 * Drizzle ORM Database Client
 *
 * One lazily created connection pool for the index database.
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '@/lib/logger';
import { InvalidConfigError } from '@/lib/rag/errors';
import * as schema from './schema';

// Create a child logger for database operations
const log = logger.child({ layer: 'db', service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type Database = PostgresJsDatabase<typeof schema>;

// =============================================================================
// Client
// =============================================================================

let dbClient: postgres.Sql | null = null;
let db: Database | null = null;

/**
 * Get the Drizzle client, connecting on first use.
 *
 * @param connectionString - Falls back to DATABASE_URL
 * @throws InvalidConfigError when no connection string is available
 */
export function getDb(connectionString: string | undefined = process.env.DATABASE_URL): Database {
  if (db) {
    return db;
  }

  if (!connectionString) {
    throw new InvalidConfigError(
      'DATABASE_URL is not set. It is required when INDEX_STORE=postgres.'
    );
  }

  dbClient = postgres(connectionString, {
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  db = drizzle(dbClient, { schema });
  log.debug({ event: 'db_connected' }, 'Created database connection');

  return db;
}

/**
 * Close the database connection.
 * Call this during graceful shutdown.
 */
export async function closeDb(): Promise<void> {
  if (dbClient) {
    await dbClient.end();
    dbClient = null;
    db = null;
    log.info({ event: 'db_closed' }, 'Database connection closed');
  }
}
