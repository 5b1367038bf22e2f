import { toError } from './errors';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  backoffFactor?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2
} as const;

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `fn` until it resolves or `maxAttempts` is reached. The delay before
 * attempt n+1 is initialDelayMs * backoffFactor^(n-1). Errors rejected by
 * `shouldRetry` are rethrown at once.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_OPTIONS.maxAttempts,
    initialDelayMs = DEFAULT_RETRY_OPTIONS.initialDelayMs,
    backoffFactor = DEFAULT_RETRY_OPTIONS.backoffFactor,
    shouldRetry = () => true,
    onRetry
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (attempt >= maxAttempts || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delay = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
      onRetry?.(lastError, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error('Max retries reached');
}
