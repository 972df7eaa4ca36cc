/**
 * Retry policy for the grid REST client.
 *
 * Only transport timeouts are retried, a small fixed number of times.
 *
 * @module client/resilience
 */

import type { RetryConfig } from '../config.js';
import { DEFAULT_RETRY_CONFIG } from '../config.js';
import { ConfigurationError, TransportError, isRetryableError } from '../errors.js';

/**
 * Called before each retry with the attempt number (1-based) and the delay.
 */
export type RetryListener = (attempt: number, delayMs: number, error: unknown) => void;

/**
 * Longest delay a single Node timer accepts.
 */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Checks a caller-supplied duration.
 *
 * @throws {ConfigurationError} unless `ms` is a finite positive number.
 */
export function requireDuration(ms: number, option: string, max: number = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isFinite(ms) || ms <= 0 || ms > max) {
    throw new ConfigurationError(`Invalid option '${option}': expected a positive duration up to ${max}ms, got ${ms}`, option);
  }
  return ms;
}

/**
 * Calls `onExpire` once `ms` have elapsed. Durations longer than one timer
 * allows are covered by a chain of timers. Returns the cancel function.
 */
export function armDeadline(ms: number, onExpire: () => void): () => void {
  const expiresAt = Date.now() + ms;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const arm = (): void => {
    const remaining = expiresAt - Date.now();
    if (remaining <= 0) {
      onExpire();
      return;
    }
    timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_MS));
  };
  arm();

  return () => clearTimeout(timer);
}

/**
 * Retry executor with bounded backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  /**
   * Execute a function with retry logic.
   *
   * @param fn - Function to execute
   * @param onRetry - Notified before each retry
   * @param signal - Cuts a pending retry delay short
   * @throws Error from the last failed attempt
   */
  async execute<T>(fn: () => Promise<T>, onRetry?: RetryListener, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.config.maxRetries) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        onRetry?.(attempt + 1, delay, error);
        await sleep(delay, signal);
      }
    }
  }

  /**
   * Calculate delay for a retry attempt.
   */
  private calculateDelay(attempt: number): number {
    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.multiplier, attempt);
    return Math.round(Math.min(baseDelay, this.config.maxDelayMs));
  }

  /**
   * Get the retry configuration.
   */
  getConfig(): Readonly<RetryConfig> {
    return { ...this.config };
  }
}

/**
 * Sleep for specified milliseconds. Rejects with an aborted TransportError
 * as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TransportError('Sleep aborted', { aborted: true }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new TransportError('Sleep aborted', { aborted: true }));
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
