import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { withRetry, isRetryable } from '../src/services/retry.js';
import { toAdvisoryError } from '../src/services/advisory-client.js';
import { mapBounded } from '../src/services/pool.js';
import { AdvisoryParseError, AdvisoryServiceError, ConfigurationError } from '../src/models/index.js';

const policy = { timeoutMs: 50, maxRetries: 2, baseDelayMs: 0 };

describe('withRetry', () => {
  it('returns the first successful value with its attempt count', async () => {
    const operation = vi.fn(async () => 'ok');
    await expect(withRetry(operation, policy)).resolves.toEqual({ value: 'ok', attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures and reports each retry', async () => {
    const transient = new AdvisoryServiceError('Advisory service error (503): unavailable', true);
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(transient)
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(withRetry(operation, policy, onRetry)).resolves.toEqual({ value: 'ok', attempts: 2 });
    expect(onRetry).toHaveBeenCalledWith(1, transient);
  });

  it('does not retry errors that will not resolve on their own', async () => {
    const operation = vi.fn(async (): Promise<string> => { throw new AdvisoryParseError('Advisory reply contains no JSON object', 'nope'); });

    await expect(withRetry(operation, policy)).rejects.toBeInstanceOf(AdvisoryParseError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries with a non-retryable error', async () => {
    const operation = vi.fn(async (): Promise<string> => { throw new AdvisoryServiceError('Advisory service unreachable: reset', true); });

    const error = await withRetry(operation, policy).catch((e: unknown) => e);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(AdvisoryServiceError);
    expect(isRetryable(error)).toBe(false);
    expect(error).toMatchObject({ message: 'Advisory service unreachable: reset (gave up after 3 attempt(s))', attempts: 3 });
  });

  it('times out a call that never answers and aborts it', async () => {
    let aborted = false;
    const operation = (signal: AbortSignal) => new Promise<string>(() => {
      signal.addEventListener('abort', () => { aborted = true; });
    });

    await expect(withRetry(operation, { timeoutMs: 10, maxRetries: 0, baseDelayMs: 0 }))
      .rejects.toThrow('Advisory call timed out after 10ms (gave up after 1 attempt(s))');
    expect(aborted).toBe(true);
  });
});

describe('toAdvisoryError', () => {
  it('maps rate limits and server errors to retryable service errors', () => {
    const limited = toAdvisoryError(new OpenAI.RateLimitError(429, undefined, 'rate limited', {}), 'vs_test_nj');
    const server = toAdvisoryError(new OpenAI.InternalServerError(500, undefined, 'boom', {}), 'vs_test_nj');

    expect(isRetryable(limited)).toBe(true);
    expect(isRetryable(server)).toBe(true);
  });

  it('maps connection failures to retryable service errors', () => {
    expect(isRetryable(toAdvisoryError(new OpenAI.APIConnectionError({ message: 'socket hang up' }), 'vs_test_nj'))).toBe(true);
  });

  it('maps a missing vector store to a configuration error', () => {
    const mapped = toAdvisoryError(new OpenAI.NotFoundError(404, undefined, 'no such vector store', {}), 'vs_missing');
    expect(mapped).toBeInstanceOf(ConfigurationError);
    expect(mapped.message.startsWith('Knowledge base vs_missing was not found')).toBe(true);
  });

  it('maps other API errors and unknown failures to non-retryable errors', () => {
    const bad = toAdvisoryError(new OpenAI.BadRequestError(400, undefined, 'bad input', {}), 'vs_test_nj');
    const unknown = toAdvisoryError('kaput', 'vs_test_nj');

    expect(bad).toBeInstanceOf(AdvisoryServiceError);
    expect(isRetryable(bad)).toBe(false);
    expect(unknown.message).toBe('Unexpected advisory failure: kaput');
    expect(isRetryable(unknown)).toBe(false);
  });
});

describe('mapBounded', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapBounded([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, ms));
      inFlight--;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('handles an empty input', async () => {
    await expect(mapBounded([], 4, async () => 'never')).resolves.toEqual([]);
  });
});
