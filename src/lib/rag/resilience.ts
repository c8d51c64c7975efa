/**
 * External Call Resilience
 *
 * Timeout, bounded exponential retry and error classification around the
 * embedding and generation services. The wrappers keep the Embedder and
 * Generator shapes, so callers never see the difference.
 */

import OpenAI from 'openai';
import type { Embedder, Generator, LLMEmbeddingOptions, LLMCompletionOptions } from '@/types/llm';
import { logger, errorMessage, logExternalCall, type Logger } from '@/lib/logger';
import {
  InvalidInputError,
  RateLimitedError,
  ServiceTimeoutError,
  ServiceUnavailableError,
  isRAGError,
  isRetryableError,
  type ServiceName,
} from './errors';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_SERVICE_TIMEOUT_MS,
  type RAGConfig,
} from './config';

const log = logger.child({ layer: 'llm', service: 'Resilience' });

// =============================================================================
// Types
// =============================================================================

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ResilienceOptions extends RetryPolicy {
  timeoutMs: number;
  /** Injected in tests to skip real waiting */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_RESILIENCE_OPTIONS: ResilienceOptions = {
  timeoutMs: DEFAULT_SERVICE_TIMEOUT_MS,
  maxRetries: DEFAULT_MAX_RETRIES,
  baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
};

export function resilienceOptionsFromConfig(
  config: Pick<RAGConfig, 'serviceTimeoutMs' | 'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs'>
): ResilienceOptions {
  return {
    timeoutMs: config.serviceTimeoutMs,
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

// =============================================================================
// Timeout
// =============================================================================

/**
 * Run an operation with a deadline. On expiry the operation's signal is
 * aborted and the returned promise rejects with ServiceTimeoutError.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  service: ServiceName
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const timer = setTimeout(() => {
      settled = true;
      controller.abort();
      reject(new ServiceTimeoutError(service, timeoutMs));
    }, timeoutMs);

    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      action();
    };

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }

    // A late settlement after the timeout is ignored
    pending.then(
      value => finish(() => resolve(value)),
      error => finish(() => reject(error))
    );
  });
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Delay before retry number `retry` (1-based).
 */
export function computeBackoffDelay(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

/**
 * Run an operation up to 1 + maxRetries times. Only retryable errors are
 * retried; anything else surfaces immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryPolicy & {
    service: ServiceName;
    operation: string;
    sleep?: (ms: number) => Promise<void>;
    logger?: Logger;
  }
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const callLog = options.logger ?? log;
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryableError(error)) {
        throw error;
      }
      if (attempt > options.maxRetries) {
        callLog.error(
          {
            event: 'external_call_exhausted',
            service: options.service,
            operation: options.operation,
            attempts: attempt,
            error: errorMessage(error),
          },
          `${options.service} ${options.operation} failed after ${attempt} attempts`
        );
        throw error;
      }

      const delay = computeBackoffDelay(attempt, options);
      logExternalCall(callLog, options.service, options.operation, {
        attempt,
        retry_in_ms: delay,
        code: isRAGError(error) ? error.code : undefined,
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Map a provider error onto the pipeline's error kinds.
 * Pipeline errors pass through; unrecognized errors are returned unchanged.
 */
export function classifyServiceError(
  error: unknown,
  service: ServiceName,
  timeoutMs = 0
): unknown {
  if (isRAGError(error)) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ServiceTimeoutError(service, timeoutMs, error);
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new RateLimitedError(service, `${service} service rate limited: ${error.message}`, error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ServiceUnavailableError(service, `${service} service unreachable: ${error.message}`, true, error);
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;

    if (status === 429) {
      return new RateLimitedError(service, `${service} service rate limited: ${error.message}`, error);
    }
    if (status === 408 || status === 409 || status >= 500) {
      return new ServiceUnavailableError(
        service,
        `${service} service failed with ${status}: ${error.message}`,
        true,
        error
      );
    }
    if (status === 400 || status === 413 || status === 422) {
      return new InvalidInputError(`${service} service rejected the input: ${error.message}`, error);
    }
    return new ServiceUnavailableError(
      service,
      `${service} service refused the request with ${status}: ${error.message}`,
      false,
      error
    );
  }

  return error;
}

// =============================================================================
// Resilient Wrappers
// =============================================================================

async function callService<T>(
  service: ServiceName,
  operationName: string,
  operation: (signal: AbortSignal) => Promise<T>,
  options: ResilienceOptions
): Promise<T> {
  const callLog = options.logger ?? log;

  return withRetry(
    async () => {
      const start = Date.now();
      try {
        const result = await withTimeout(operation, options.timeoutMs, service);
        logExternalCall(callLog, service, operationName, { duration_ms: Date.now() - start });
        return result;
      } catch (error) {
        throw classifyServiceError(error, service, options.timeoutMs);
      }
    },
    { ...options, service, operation: operationName, logger: callLog }
  );
}

/**
 * Wrap an embedder with timeout and retry. Each attempt gets its own
 * abort signal, which replaces any signal passed in the call options.
 */
export function createResilientEmbedder(
  embedder: Embedder,
  options: Partial<ResilienceOptions> = {}
): Embedder {
  const opts = { ...DEFAULT_RESILIENCE_OPTIONS, ...options };

  return {
    embed: (text: string, embedOptions?: LLMEmbeddingOptions) =>
      callService(
        'embedding',
        'embed',
        signal => embedder.embed(text, { ...embedOptions, signal }),
        opts
      ),
    embedBatch: (texts: string[], embedOptions?: LLMEmbeddingOptions) =>
      callService(
        'embedding',
        'embed_batch',
        signal => embedder.embedBatch(texts, { ...embedOptions, signal }),
        opts
      ),
  };
}

export function createResilientGenerator(
  generator: Generator,
  options: Partial<ResilienceOptions> = {}
): Generator {
  const opts = { ...DEFAULT_RESILIENCE_OPTIONS, ...options };

  return {
    complete: (messages, completionOptions?: LLMCompletionOptions) =>
      callService(
        'generation',
        'complete',
        signal => generator.complete(messages, { ...completionOptions, signal }),
        opts
      ),
  };
}
