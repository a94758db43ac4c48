/**
 * Raised once an operation has used up its attempts, or failed with an error
 * the caller marked as not retryable
 */
export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly attempt: number,
    public readonly maxAttempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;

  /** Fixed wait between attempts in milliseconds */
  delayMs: number;

  /** Return false to stop retrying on this error */
  isRetryable?: (error: unknown) => boolean;

  /** Called after a failed attempt that will be retried, before waiting */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;

  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Run an operation up to `maxAttempts` times with a fixed delay in between
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (options.isRetryable && !options.isRetryable(error)) {
        throw new RetryExhaustedError(
          `Failed to ${operationName}: ${formatError(error)}`,
          operationName,
          attempt,
          maxAttempts,
          error
        );
      }

      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(
          `Failed to ${operationName} after ${maxAttempts} attempts. Last error: ${formatError(error)}`,
          operationName,
          attempt,
          maxAttempts,
          error
        );
      }

      options.onRetry?.(attempt, error, options.delayMs);
      await wait(options.delayMs);
    }
  }
}
