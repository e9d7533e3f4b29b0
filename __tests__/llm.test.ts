import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { TransientError } from '../src/lib/errors.js';
import { classifyProviderError } from '../src/lib/llm.js';

describe('classifyProviderError', () => {
  it('marks timeouts as transient', () => {
    const error = classifyProviderError(new Anthropic.APIConnectionTimeoutError());
    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ reason: 'timeout' });
  });

  it('marks rate limits as transient', () => {
    const error = classifyProviderError(new Anthropic.RateLimitError(429, undefined, 'slow down', undefined));
    expect(error).toMatchObject({ kind: 'transient', reason: 'rate_limit' });
  });

  it('marks server and connection errors as transient', () => {
    expect(classifyProviderError(new Anthropic.InternalServerError(529, undefined, 'overloaded', undefined))).toMatchObject({
      reason: 'unavailable',
    });
    expect(classifyProviderError(new Anthropic.APIConnectionError({ message: 'ECONNRESET' }))).toMatchObject({
      reason: 'unavailable',
    });
  });

  it('passes other errors through unchanged', () => {
    const original = new Anthropic.BadRequestError(400, undefined, 'bad model', undefined);
    expect(classifyProviderError(original)).toBe(original);
    expect(classifyProviderError('boom')).toEqual(new Error('boom'));
  });
});
