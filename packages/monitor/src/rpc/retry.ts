/**
 * Bounded retry with exponential backoff
 * Formula: delay = min(baseDelay * 2 ^ attempt, maxDelay)
 */

export interface RetryOptions {
  /** Retries after the first attempt (0 disables retrying) */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const NO_RETRY: RetryOptions = { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 };

// wakes early when the signal fires
const defaultSleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const wake = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal?.addEventListener('abort', wake, { once: true });
  });

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Run an operation, retrying while isRetryable() accepts the error.
 * The last error is rethrown once the budget is spent or the signal fires.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  options: RetryOptions,
  signal?: AbortSignal
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryable(error) || signal?.aborted) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs, signal);
      if (signal?.aborted) throw error;
    }
  }
}
