import { APICallError } from 'ai';
import OpenAI from 'openai';
import { ModelFatalError, ModelTransientError } from '../../errors.js';
import { CircuitBreaker } from '../review/circuit-breaker.js';

export type ErrorClass = 'transient' | 'fatal';

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

export function classifyStatus(status: number): ErrorClass {
  return TRANSIENT_STATUSES.has(status) || status >= 500 ? 'transient' : 'fatal';
}

function statusOf(error: unknown): number | undefined {
  if (APICallError.isInstance(error)) return error.statusCode;
  if (error instanceof OpenAI.APIError) return error.status;
  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return undefined;
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

/**
 * Transient: rate limits, server errors, timeouts, dropped connections and
 * overload responses. Everything else, including invalid model output, is fatal.
 */
export function classifyModelError(error: unknown): ErrorClass {
  if (error instanceof ModelTransientError) return 'transient';
  if (error instanceof ModelFatalError) return 'fatal';

  // Connection failures carry no status
  if (error instanceof OpenAI.APIConnectionError) return 'transient';

  const status = statusOf(error);
  if (status !== undefined) return classifyStatus(status);

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'transient';
    if ('code' in error && typeof error.code === 'string' && NETWORK_CODES.has(error.code)) return 'transient';
    if (error.message.toLowerCase().includes('fetch failed')) return 'transient';
  }

  return CircuitBreaker.isOverloadError(error) ? 'transient' : 'fatal';
}

export function isTransientModelError(error: unknown): boolean {
  return classifyModelError(error) === 'transient';
}
