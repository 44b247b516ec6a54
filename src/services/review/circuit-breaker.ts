import type { CircuitBreakerState } from './types.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface CircuitBreakerOptions {
  maxFailures?: number;
  resetTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Circuit Breaker for model provider overload
 *
 * Opens after `maxFailures` consecutive overload failures and blocks calls
 * until `resetTimeoutMs` has passed since the last one.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.state = {
      isOpen: false,
      failureCount: 0,
      lastFailureTime: 0,
      resetTimeoutMs: options.resetTimeoutMs ?? 300000, // 5 minutes for rate limit recovery
      maxFailures: options.maxFailures ?? 5,
    };
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Check if the circuit breaker allows the operation
   */
  canExecute(): boolean {
    const now = this.now();

    if (this.state.isOpen) {
      if (now - this.state.lastFailureTime > this.state.resetTimeoutMs) {
        this.state.isOpen = false;
        this.state.failureCount = 0;
        this.logger.info('Circuit breaker reset - attempting model calls again');
        return true;
      }
      this.logger.warn('Circuit breaker is open - blocking model call', {
        timeUntilReset: this.state.resetTimeoutMs - (now - this.state.lastFailureTime),
      });
      return false;
    }

    return true;
  }

  recordSuccess(): void {
    this.state.failureCount = 0;
  }

  /**
   * Record a failure and potentially open the circuit
   */
  recordFailure(isOverloadError: boolean): void {
    if (!isOverloadError) return;

    this.state.failureCount++;
    this.state.lastFailureTime = this.now();

    if (this.state.failureCount >= this.state.maxFailures && !this.state.isOpen) {
      this.state.isOpen = true;
      this.logger.warn('Circuit breaker opened due to repeated overload errors', {
        failureCount: this.state.failureCount,
      });
    }
  }

  /**
   * Check if an error is an overload error
   */
  static isOverloadError(error: unknown): boolean {
    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
    return (
      message.includes('overload') ||
      message.includes('529') ||
      message.includes('rate limit') ||
      message.includes('tokens per minute') ||
      message.includes('too many requests') ||
      message.includes('quota exceeded')
    );
  }
}
