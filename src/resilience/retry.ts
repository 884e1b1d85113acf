import { RetryPolicy } from '../config/pipeline-config';
import { TimeoutError, toError } from '../errors/pipeline-errors';

/** Helper: async delay */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff for the given retry number (1 = first retry), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const raw = policy.baseDelayMs * 2 ** Math.max(0, retry - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Race a promise against a timer. The timer is cleared either way so
 * nothing stays scheduled after the operation settles.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (err: Error, attempt: number) => boolean;
  onRetry?: (err: Error, attempt: number, delayMs: number) => void;
}

/**
 * Run an operation up to `policy.attempts` times with exponential backoff between attempts.
 * The last error is rethrown once attempts run out.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: Error = new Error('retryWithBackoff: no attempt made');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = toError(err);
      if (attempt >= attempts) break;
      if (options.shouldRetry && !options.shouldRetry(lastError, attempt)) break;

      const wait = backoffDelay(policy, attempt);
      options.onRetry?.(lastError, attempt, wait);
      await delay(wait);
    }
  }

  throw lastError;
}
