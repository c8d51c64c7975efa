/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Query tracing via traceId
 * - Environment-based configuration
 * - Secret redaction in error messages
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test';

/**
 * Pino configuration options
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // JSON in production and under test, pretty print in development
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

// =============================================================================
// Request Context
// =============================================================================

/**
 * Per-question context for tracing
 */
export interface RequestContext {
  traceId: string;
  source?: string;
  startTime: number;
}

/**
 * Generate a new request context with unique traceId
 */
export function createRequestContext(options?: { source?: string }): RequestContext {
  return {
    traceId: randomUUID(),
    source: options?.source,
    startTime: Date.now(),
  };
}

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

export type LogLayer = 'rag' | 'llm' | 'db' | 'ingestion' | 'cli';

/**
 * Create a child logger for a specific layer, bound to the request's
 * trace id and source when a context is given.
 */
export function createLayerLogger(layer: LogLayer, ctx?: RequestContext): Logger {
  if (!ctx) {
    return logger.child({ layer });
  }
  return logger.child({
    traceId: ctx.traceId,
    ...(ctx.source && { source: ctx.source }),
    layer,
  });
}

/**
 * Pre-configured layer loggers (without request context)
 */
export const loggers = {
  rag: logger.child({ layer: 'rag' }),
  llm: logger.child({ layer: 'llm' }),
  db: logger.child({ layer: 'db' }),
  ingestion: logger.child({ layer: 'ingestion' }),
  cli: logger.child({ layer: 'cli' }),
};

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;

/**
 * Patterns for detecting sensitive data
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI API keys
  /postgres(ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi, // API key values
];

function redactSecrets(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

/**
 * Error message suitable for a log line.
 */
export function errorMessage(error: unknown): string {
  return redactSecrets(error instanceof Error ? error.message : String(error));
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = Date.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  getDuration(name: string): number | undefined {
    return this.durations.get(name);
  }

  /**
   * Get total elapsed time
   */
  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log a database operation
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: {
    table?: string;
    rows?: number;
    duration_ms: number;
    error?: string;
  }
): void {
  if (details.error) {
    log.error(
      { event: 'db_operation', operation, ...details },
      `Database ${operation} failed: ${details.error}`
    );
  } else {
    log.debug(
      { event: 'db_operation', operation, ...details },
      `Database ${operation} completed`
    );
  }
}

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'embedding' | 'generation',
  operation: string,
  details: {
    duration_ms?: number;
    attempt?: number;
    retry_in_ms?: number;
    code?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
  };

  if (details.error) {
    log.warn(baseLog, `${service} ${operation} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'embedding' | 'retrieval' | 'prompt' | 'generation' | 'citation',
  details: {
    duration_ms?: number;
    chunks?: number;
    tokens?: number;
    confidence?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';
