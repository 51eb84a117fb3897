import { isChainError } from '../errors.js';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
};

export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
}

/**
 * Run a chain call, retrying retryable ChainErrors with exponential backoff.
 * Anything else (and the last failure) is rethrown as-is.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastAttempt = attempt + 1 >= options.attempts;
      if (!isChainError(error) || !error.retryable || lastAttempt) {
        throw error;
      }

      const delay = backoffDelay(attempt, options);
      console.log(`[retry] ${label} failed (${error.kind}), attempt ${attempt + 1}/${options.attempts}, retrying in ${delay}ms`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
