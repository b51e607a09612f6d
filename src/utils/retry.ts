/**
 * Retry Manager with Exponential Backoff
 * Bounded retries with exponential backoff and jitter for outbound calls
 * (TestRail, LLM providers, Slack).
 */

import type { Logger } from './logger.js';

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /**
   * Total attempts including the first one
   */
  maxAttempts: number;

  initialBackoffMs: number;

  backoffMultiplier: number;

  maxBackoffMs: number;

  /**
   * Jitter factor to add to backoff (0-1)
   */
  jitterFactor: number;
}

/**
 * Errors may declare themselves transient; anything else falls back to message matching
 */
export interface RetryableErrorShape {
  transient?: boolean;
  isRetryable?: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 10000,
  jitterFactor: 0.1,
};

const RETRYABLE_PATTERNS = [
  'timeout',
  'timed out',
  'aborted',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'eai_again',
  'fetch failed',
  'socket hang up',
  'rate limit',
  'too many requests',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
  'internal server error',
];

function hasRetryFlags(error: object): error is RetryableErrorShape {
  return 'transient' in error || 'isRetryable' in error;
}

/**
 * Decide whether an error is worth another attempt
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (hasRetryFlags(error)) {
    return Boolean(error.transient ?? error.isRetryable);
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Manages retry logic with exponential backoff and jitter
 */
export class RetryManager {
  private readonly config: RetryConfig;
  private readonly logger?: Logger;
  private readonly shouldRetry: (error: unknown) => boolean;

  constructor(
    config?: Partial<RetryConfig>,
    logger?: Logger,
    shouldRetry: (error: unknown) => boolean = isTransientError
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = logger;
    this.shouldRetry = shouldRetry;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Execute a function with retry logic
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, context: string): Promise<T> {
    let lastError: unknown;
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);

        if (!this.shouldRetry(error)) {
          this.logger?.debug('Non-retryable error encountered', { context, attempt, error: message });
          throw error;
        }

        if (attempt >= maxAttempts) {
          this.logger?.warn('Max retry attempts reached', { context, attempts: attempt, error: message });
          throw error;
        }

        const delay = this.calculateBackoff(attempt);

        this.logger?.warn('Retrying after error', {
          context,
          attempt,
          maxAttempts,
          delayMs: delay,
          error: message,
        });

        await this.delay(delay);
      }
    }

    throw lastError;
  }

  private calculateBackoff(attempt: number): number {
    const baseDelay = Math.min(
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1),
      this.config.maxBackoffMs
    );

    const jitter = baseDelay * this.config.jitterFactor * (Math.random() * 2 - 1);

    return Math.max(0, Math.round(baseDelay + jitter));
  }

  private delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
