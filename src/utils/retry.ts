import { logger } from './logger.js';
import { sleep } from './time.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Default retry options
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

/**
 * Calculate backoff delay with jitter
 */
function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const clampedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitterAmount = clampedDelay * options.jitter * (Math.random() * 2 - 1);
  return Math.round(clampedDelay + jitterAmount);
}

/**
 * Check if an error is retryable (default implementation)
 */
export function isRetryableError(error: unknown): boolean {
  // Retry on network errors
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket hang up')
    ) {
      return true;
    }

    // Retry on rate limit errors (429)
    if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
      return true;
    }

    // Retry on server errors (5xx)
    if (message.includes('500') || message.includes('502') || message.includes('503') || message.includes('504')) {
      return true;
    }
  }

  return false;
}

/**
 * Execute a function with retry logic
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const log = logger('Retry');

  let lastError: unknown;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Check if we should retry
      const shouldRetry = opts.retryOn ? opts.retryOn(error) : isRetryableError(error);

      if (!shouldRetry || attempt === opts.maxAttempts - 1) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error, delayMs);
      } else {
        log.warn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}
