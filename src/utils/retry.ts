/**
 * Retry utility with exponential backoff
 */

import { createLogger } from './logger';
import { ProviderHttpError, errorMessage } from './errors';
import { sleep } from './concurrency';

const logger = createLogger('retry');

export interface RetryOptions {
  /** Total number of attempts, the first one included */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (error: Error) => boolean;
  /** Stops retrying (and waiting) once aborted */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Calculate exponential backoff delay with jitter
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = Math.random() * 0.1 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      logger.warn(`Attempt ${attempt} of ${opts.maxRetries} failed`, {
        error: lastError.message,
        attempt,
        maxRetries: opts.maxRetries,
      });

      if (opts.shouldRetry && !opts.shouldRetry(lastError)) {
        logger.debug('Error is not retryable, throwing immediately');
        throw lastError;
      }

      if (opts.signal?.aborted) {
        throw lastError;
      }

      // Don't wait after the last attempt
      if (attempt < opts.maxRetries) {
        const delay = calculateDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
        logger.debug(`Waiting ${Math.round(delay)}ms before retry`);
        await sleep(delay, opts.signal);
      }
    }
  }

  throw lastError ?? new Error('All retry attempts failed');
}

/**
 * Statuses worth another attempt: timeouts, rate limiting and server-side failures
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Default retry predicate for provider errors
 * Returns true for errors that should be retried (5xx, 408, 429, network errors)
 */
export function isRetryableHttpError(error: Error): boolean {
  if (error instanceof ProviderHttpError) {
    // No status means no response arrived: network-level failure
    return error.status === undefined || isTransientStatus(error.status);
  }

  if (error.name === 'AbortError' || error.name === 'CanceledError' || error.name === 'RunTimeout') {
    return false;
  }

  const message = errorMessage(error).toLowerCase();

  if (message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket hang up') ||
      message.includes('network')) {
    return true;
  }

  const statusMatch = message.match(/status[:\s]*(\d{3})/i);
  if (statusMatch) {
    return isTransientStatus(parseInt(statusMatch[1], 10));
  }

  if (message.includes('overload') || message.includes('capacity') || message.includes('throttl')) {
    return true;
  }

  return false;
}
