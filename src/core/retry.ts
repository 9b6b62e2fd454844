import { sleep as defaultSleep, SleepFn } from "./sleep";

export type BackoffPolicy = (attempt: number) => number;

export interface RetryOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  sleep?: SleepFn;
  /** Returning false rethrows the error as is, without further attempts. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`gave up after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/**
 * Delay before the retry that follows `attempt` (1-based):
 * `min(baseMs * 2^(attempt - 1), capMs)`.
 */
export function exponentialBackoff(baseMs = 1_000, capMs = 10_000): BackoffPolicy {
  return (attempt) => Math.min(baseMs * 2 ** (attempt - 1), capMs);
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = options.backoff(attempt);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}
