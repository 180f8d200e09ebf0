import { describeError } from "../core/errors";

export type RetryOptions = {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  isRetryable?: (error: unknown) => boolean;
};

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffMultiplier: 2
};

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  label: string
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  let delay = options.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.isRetryable ? options.isRetryable(error) : true;
      if (!retryable || attempt >= maxAttempts) {
        throw error;
      }

      console.warn(`[${label}] attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms: ${describeError(error)}`);
      if (delay > 0) {
        await sleep(delay);
      }
      delay = Math.min(delay * options.backoffMultiplier, options.maxDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
