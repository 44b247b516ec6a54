import { setTimeout as sleep } from 'node:timers/promises';
import type { RetryConfig } from '../config.js';
import { errorMessage, type Logger } from './logger.js';

export interface RetryOptions {
  config: RetryConfig;
  logger: Logger;
  /** Label used in log lines, e.g. the file path being reviewed. */
  label: string;
  isTransient: (error: unknown) => boolean;
  /** Per-attempt timeout; the signal passed to `fn` aborts when it elapses. */
  timeoutMs?: number;
}

export function backoffDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = Math.min(config.baseDelayMs * Math.pow(2, attempt - 1), config.maxDelayMs);
  const jitter = config.enableJitter ? Math.random() * 1000 : 0;
  return exponentialDelay + jitter;
}

/**
 * Runs `fn` until it succeeds, a non-transient error is thrown, or the attempt
 * ceiling is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal | undefined, attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { config, logger, label, isTransient, timeoutMs } = options;
  const maxAttempts = Math.max(1, config.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const signal = timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs);
      return await fn(signal, attempt);
    } catch (error) {
      const transient = isTransient(error);

      logger.warn('Attempt failed', {
        label,
        attempt,
        maxAttempts,
        transient,
        error: errorMessage(error),
      });

      if (!transient || attempt >= maxAttempts) {
        throw error;
      }

      const delay = backoffDelay(attempt, config);
      logger.info('Retrying with backoff', {
        label,
        nextAttempt: attempt + 1,
        delayMs: Math.round(delay),
      });
      await sleep(delay);
    }
  }
}
