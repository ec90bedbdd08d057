export interface RetryOptions {
  attempts: number;
  delayMs: number;
  onRetry?: (attempt: number, err: Error) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Call `fn` until it resolves, waiting a fixed delay between attempts. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt < options.attempts) {
        options.onRetry?.(attempt, lastError);
        await wait(options.delayMs);
      }
    }
  }

  throw lastError ?? new Error('Retry attempts exhausted');
}
