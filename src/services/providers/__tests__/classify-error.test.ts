import { APICallError } from 'ai';
import OpenAI from 'openai';
import { describe, expect, it } from 'vitest';
import { ModelFatalError, ModelTransientError } from '../../../errors.js';
import { classifyModelError, classifyStatus } from '../classify-error.js';

function apiCallError(statusCode: number): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: 'https://models.test/v1/messages',
    requestBodyValues: {},
    statusCode,
  });
}

describe('classifyStatus', () => {
  it.each([
    [408, 'transient'],
    [409, 'transient'],
    [425, 'transient'],
    [429, 'transient'],
    [500, 'transient'],
    [529, 'transient'],
    [400, 'fatal'],
    [401, 'fatal'],
    [404, 'fatal'],
    [422, 'fatal'],
  ])('classifies %i as %s', (status, expected) => {
    expect(classifyStatus(status)).toBe(expected);
  });
});

describe('classifyModelError', () => {
  it('keeps the class of its own errors', () => {
    expect(classifyModelError(new ModelTransientError('Circuit breaker is open'))).toBe('transient');
    expect(classifyModelError(new ModelFatalError('Model returned malformed JSON'))).toBe('fatal');
  });

  it('reads the status of AI SDK call errors', () => {
    expect(classifyModelError(apiCallError(429))).toBe('transient');
    expect(classifyModelError(apiCallError(401))).toBe('fatal');
  });

  it('reads the status of OpenAI errors', () => {
    expect(classifyModelError(new OpenAI.APIError(500, undefined, 'Internal error', undefined))).toBe('transient');
    expect(classifyModelError(new OpenAI.APIError(400, undefined, 'Bad request', undefined))).toBe('fatal');
    expect(classifyModelError(new OpenAI.APIConnectionError({ message: 'Connection error.' }))).toBe('transient');
  });

  it('treats timeouts and dropped connections as transient', () => {
    expect(classifyModelError(Object.assign(new Error('The operation was aborted'), { name: 'TimeoutError' }))).toBe(
      'transient'
    );
    expect(classifyModelError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))).toBe('transient');
    expect(classifyModelError(new TypeError('fetch failed'))).toBe('transient');
  });

  it('treats overload messages as transient', () => {
    expect(classifyModelError(new Error('Anthropic API is overloaded'))).toBe('transient');
  });

  it('treats anything else as fatal', () => {
    expect(classifyModelError(new SyntaxError('Unexpected token } in JSON'))).toBe('fatal');
    expect(classifyModelError('unknown failure')).toBe('fatal');
  });
});
