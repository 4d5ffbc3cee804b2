/**
 * Shared retry and timeout utilities for HTTP calls
 */

export class TimeoutError extends Error {
  constructor(public readonly context: string, public readonly ms: number) {
    super(`Timeout after ${ms}ms: ${context}`);
    this.name = "TimeoutError";
  }
}

/**
 * Wrap a promise with a timeout
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, context: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(context, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Called before each backoff sleep */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  { maxRetries = 3, baseDelayMs = 1000, onRetry }: RetryOptions = {}
): Promise<T> {
  let lastError: Error = new Error("withRetry: no attempt made");
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < maxRetries) {
        const delay = baseDelayMs * Math.pow(2, attempt);
        onRetry?.(lastError, attempt + 1, delay);
        await sleep(delay);
      }
    }
  }
  throw lastError;
}
