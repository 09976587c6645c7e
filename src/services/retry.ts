//timeout + bounded exponential backoff around one advisory call
import { AdvisoryServiceError } from '../models/index.js';

export interface RetryPolicy {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export type RetryHook = (attempt: number, error: AdvisoryServiceError) => void;

//only transient service failures are worth another attempt
export function isRetryable(error: unknown): error is AdvisoryServiceError {
  return error instanceof AdvisoryServiceError && error.retryable;
}

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      //settle first so the race reports the timeout, not the aborted call
      reject(new AdvisoryServiceError(`Advisory call timed out after ${timeoutMs}ms`, true));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function withRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: RetryHook,
): Promise<RetryOutcome<T>> {
  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await withTimeout(operation, policy.timeoutMs), attempts: attempt };
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt > policy.maxRetries) {
        throw new AdvisoryServiceError(`${error.message} (gave up after ${attempt} attempt(s))`, false, attempt, { cause: error });
      }
      onRetry?.(attempt, error);
      await delay(policy.baseDelayMs * 2 ** (attempt - 1));
    }
  }
}
