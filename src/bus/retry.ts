export interface RetryOptions {
  /** Retries after the first attempt; 0 means a single attempt. */
  retries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Returning false stops retrying and rethrows immediately. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Exponential backoff with up to 10% jitter, capped at `maxDelayMs`. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number = Math.random): number {
  const backoffMs = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  const jitter = random() * 0.1 * backoffMs;
  return Math.round(backoffMs + jitter);
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const exhausted = attempt > options.retries;
      if (exhausted || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, options.random);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
