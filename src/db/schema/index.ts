/**
 * Schema exports for Drizzle ORM.
 */

// Saved embedding indexes (index metadata, chunk records)
export * from './corpus';
