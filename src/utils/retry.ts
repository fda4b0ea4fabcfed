/**
 * Retry utility with exponential backoff
 *
 * Configuration via environment variables:
 * - LIFEQ_RETRY_MAX_ATTEMPTS: Maximum retry attempts (default: 3)
 * - LIFEQ_RETRY_INITIAL_DELAY_MS: Initial delay in ms (default: 100)
 * - LIFEQ_RETRY_MAX_DELAY_MS: Maximum delay in ms (default: 5000)
 * - LIFEQ_RETRY_BACKOFF_MULTIPLIER: Backoff multiplier (default: 2)
 */

import { logger } from './logger.js';
import { config } from '../config/index.js';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Defaults are read per call so reloadConfig() takes effect.
 */
function defaultOptions(): Required<RetryOptions> {
  return {
    maxAttempts: config.retry.maxAttempts,
    initialDelayMs: config.retry.initialDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
    backoffMultiplier: config.retry.backoffMultiplier,
    retryableErrors: () => true,
    onRetry: () => {},
  };
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...defaultOptions(), ...options };
  let lastError: Error = new Error('Retry failed');
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryableErrors(lastError)) {
        throw lastError;
      }

      opts.onRetry(lastError, attempt);
      logger.warn({ error: lastError.message, attempt }, 'Retrying operation');

      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

export function isRetryableNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up') ||
    message.includes('network') ||
    message.includes('rate limit') ||
    message.includes('503') ||
    message.includes('502') ||
    message.includes('504')
  );
}
