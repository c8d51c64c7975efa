import { defineConfig } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration
 *
 * Schema for the Postgres index store (INDEX_STORE=postgres).
 *
 * Usage:
 *   npm run db:generate       # Generate migrations
 *   npx drizzle-kit migrate   # Run migrations
 *   npx drizzle-kit studio    # Open Drizzle Studio
 */
export default defineConfig({
  schema: './src/db/schema/corpus.ts',
  out: './src/db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
