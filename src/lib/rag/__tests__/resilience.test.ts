/**
 * Tests for timeout, retry and error classification.
 */

import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import {
  classifyServiceError,
  computeBackoffDelay,
  createResilientEmbedder,
  createResilientGenerator,
  withRetry,
  withTimeout,
} from '../resilience';
import {
  InvalidInputError,
  RateLimitedError,
  ServiceTimeoutError,
  ServiceUnavailableError,
} from '../errors';
import type { Embedder, Generator } from '@/types/llm';

const policy = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000 };

// =============================================================================
// Backoff
// =============================================================================

describe('computeBackoffDelay', () => {
  it('should double per retry up to the maximum', () => {
    expect([1, 2, 3, 4, 5].map(n => computeBackoffDelay(n, policy))).toEqual([
      100, 200, 400, 800, 1000,
    ]);
  });
});

// =============================================================================
// withRetry
// =============================================================================

describe('withRetry', () => {
  it('should retry retryable errors with backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError('embedding', 'slow down'))
      .mockRejectedValueOnce(new ServiceUnavailableError('embedding', 'down', true))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(operation, { ...policy, service: 'embedding', operation: 'embed', sleep });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(call => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should surface non-retryable errors immediately', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const error = new InvalidInputError('too long');
    const operation = vi.fn().mockRejectedValue(error);

    await expect(
      withRetry(operation, { ...policy, service: 'embedding', operation: 'embed', sleep })
    ).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry permanent service errors', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const operation = vi.fn().mockRejectedValue(
      new ServiceUnavailableError('generation', 'bad key', false)
    );

    await expect(
      withRetry(operation, { ...policy, service: 'generation', operation: 'complete', sleep })
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error after 1 + maxRetries attempts', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const last = new ServiceTimeoutError('generation', 50);
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new ServiceTimeoutError('generation', 50))
      .mockRejectedValueOnce(new ServiceTimeoutError('generation', 50))
      .mockRejectedValueOnce(last);

    await expect(
      withRetry(operation, { ...policy, maxRetries: 2, service: 'generation', operation: 'complete', sleep })
    ).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });
});

// =============================================================================
// withTimeout
// =============================================================================

describe('withTimeout', () => {
  it('should resolve when the operation finishes in time', async () => {
    await expect(withTimeout(async () => 42, 1000, 'embedding')).resolves.toBe(42);
  });

  it('should abort the operation and reject with ServiceTimeoutError', async () => {
    let seen: AbortSignal | undefined;
    const operation = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        seen = signal;
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const error = await withTimeout(operation, 10, 'generation').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceTimeoutError);
    expect(error).toMatchObject({ code: 'SERVICE_TIMEOUT', retryable: true, timeoutMs: 10 });
    expect(seen?.aborted).toBe(true);
  });

  it('should pass through operation failures', async () => {
    const failure = new Error('boom');

    await expect(
      withTimeout(() => Promise.reject(failure), 1000, 'embedding')
    ).rejects.toBe(failure);
  });

  it('should reject when the operation throws synchronously', async () => {
    await expect(
      withTimeout(() => {
        throw new Error('sync');
      }, 1000, 'embedding')
    ).rejects.toThrow('sync');
  });
});

// =============================================================================
// Classification
// =============================================================================

describe('classifyServiceError', () => {
  it('should map connection timeouts to ServiceTimeoutError', () => {
    const result = classifyServiceError(new OpenAI.APIConnectionTimeoutError(), 'embedding', 500);

    expect(result).toBeInstanceOf(ServiceTimeoutError);
    expect(result).toMatchObject({ service: 'embedding', timeoutMs: 500, retryable: true });
  });

  it('should map 429 to RateLimitedError', () => {
    const result = classifyServiceError(
      new OpenAI.RateLimitError(429, undefined, 'slow down', {}),
      'generation'
    );

    expect(result).toBeInstanceOf(RateLimitedError);
    expect(result).toMatchObject({ code: 'RATE_LIMITED', retryable: true });
  });

  it('should map connection failures to retryable ServiceUnavailableError', () => {
    const result = classifyServiceError(
      new OpenAI.APIConnectionError({ message: 'socket hang up' }),
      'embedding'
    );

    expect(result).toBeInstanceOf(ServiceUnavailableError);
    expect(result).toMatchObject({ retryable: true });
  });

  it.each([500, 502, 503, 408, 409])('should treat status %i as retryable', (status) => {
    const result = classifyServiceError(
      new OpenAI.APIError(status, undefined, 'failed', undefined),
      'generation'
    );

    expect(result).toBeInstanceOf(ServiceUnavailableError);
    expect(result).toMatchObject({ retryable: true });
  });

  it.each([400, 413, 422])('should map status %i to InvalidInputError', (status) => {
    const result = classifyServiceError(
      new OpenAI.APIError(status, undefined, 'bad input', undefined),
      'embedding'
    );

    expect(result).toBeInstanceOf(InvalidInputError);
  });

  it.each([401, 403, 404])('should treat status %i as a permanent failure', (status) => {
    const result = classifyServiceError(
      new OpenAI.APIError(status, undefined, 'refused', undefined),
      'generation'
    );

    expect(result).toBeInstanceOf(ServiceUnavailableError);
    expect(result).toMatchObject({ retryable: false });
  });

  it('should return pipeline and unknown errors unchanged', () => {
    const pipelineError = new InvalidInputError('empty');
    const unknownError = new TypeError('unexpected');

    expect(classifyServiceError(pipelineError, 'embedding')).toBe(pipelineError);
    expect(classifyServiceError(unknownError, 'embedding')).toBe(unknownError);
  });
});

// =============================================================================
// Resilient Wrappers
// =============================================================================

describe('createResilientEmbedder', () => {
  it('should retry classified provider errors and pass a signal per attempt', async () => {
    const embed = vi.fn();
    const embedBatch = vi
      .fn()
      .mockRejectedValueOnce(new OpenAI.APIError(503, undefined, 'unavailable', undefined))
      .mockResolvedValueOnce([{ embedding: [1, 0], usage: { promptTokens: 1, totalTokens: 1 } }]);
    const embedder: Embedder = { embed, embedBatch };
    const sleep = vi.fn().mockResolvedValue(undefined);

    const resilient = createResilientEmbedder(embedder, { ...policy, timeoutMs: 1000, sleep });
    const result = await resilient.embedBatch(['text'], { model: 'text-embedding-3-small' });

    expect(result).toEqual([{ embedding: [1, 0], usage: { promptTokens: 1, totalTokens: 1 } }]);
    expect(embedBatch).toHaveBeenCalledTimes(2);
    const options = embedBatch.mock.calls[1]?.[1];
    expect(options?.model).toBe('text-embedding-3-small');
    expect(options?.signal).toBeInstanceOf(AbortSignal);
    expect(sleep.mock.calls).toEqual([[100]]);
  });

  it('should surface rejected input without retrying', async () => {
    const embed = vi.fn().mockRejectedValue(new OpenAI.APIError(400, undefined, 'too long', undefined));
    const embedder: Embedder = { embed, embedBatch: vi.fn() };
    const sleep = vi.fn().mockResolvedValue(undefined);

    const resilient = createResilientEmbedder(embedder, { ...policy, timeoutMs: 1000, sleep });

    await expect(resilient.embed('text')).rejects.toBeInstanceOf(InvalidInputError);
    expect(embed).toHaveBeenCalledTimes(1);
  });
});

describe('createResilientGenerator', () => {
  it('should time out a hanging call', async () => {
    const generator: Generator = {
      complete: () => new Promise(() => undefined),
    };

    const resilient = createResilientGenerator(generator, { ...policy, maxRetries: 0, timeoutMs: 10 });

    await expect(resilient.complete([{ role: 'user', content: 'Hi' }])).rejects.toBeInstanceOf(
      ServiceTimeoutError
    );
  });
});
