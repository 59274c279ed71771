export interface RetryOptions<T> {
  maxAttempts: number;
  baseDelayMs: number;
  fallback: (lastError: Error, attempts: number) => T;
  onRetry?: (attempt: number, error: Error) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
  usedFallback: boolean;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/** Delay before the attempt following `attempt` (1-based): base, 2·base, 4·base, ... */
export const backoffDelay = (baseDelayMs: number, attempt: number): number =>
  baseDelayMs * Math.pow(2, attempt - 1);

/**
 * Runs `fn` up to `maxAttempts` times with exponential backoff between
 * attempts. When every attempt fails the fallback value is returned instead
 * of raising.
 */
export async function retryOrFallback<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: Error = new Error('No attempt made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt, usedFallback: false };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts) {
        break;
      }

      options.onRetry?.(attempt, lastError);
      await sleep(backoffDelay(options.baseDelayMs, attempt));
    }
  }

  return {
    value: options.fallback(lastError, maxAttempts),
    attempts: maxAttempts,
    usedFallback: true,
  };
}
