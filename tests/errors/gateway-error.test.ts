/**
 * Unit Tests for gateway errors
 */

import { describe, it, expect } from 'vitest';
import {
  AuthRejectedError,
  DependencyUnavailableError,
  GatewayError,
  GatewayErrorCode,
  GenerationError,
  InvalidRequestError,
  PayloadTooLargeError,
  QuotaExceededError,
  RateLimitedError,
  isGatewayError,
  publicMessageFor,
  toError,
  toErrorBody,
} from '../../lib/src/errors/index.js';

describe('GatewayError', () => {
  it('should default status and public message from the code', () => {
    const error = new GatewayError('upstream 500 from 10.0.0.5', GatewayErrorCode.RETRIEVAL_ERROR);

    expect(error.status).toBe(502);
    expect(error.publicMessage).toBe('The search service is temporarily unavailable.');
    expect(error.message).toBe('upstream 500 from 10.0.0.5');
  });

  it('should pass gateway errors through fromError', () => {
    const original = new RateLimitedError(20, 12);

    expect(GatewayError.fromError(original)).toBe(original);
  });

  it('should wrap anything else as an internal error', () => {
    const cause = new TypeError('x is undefined');
    const wrapped = GatewayError.fromError(cause, { path: '/api/v1/chat' });

    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.status).toBe(500);
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.metadata).toEqual({ path: '/api/v1/chat' });
    expect(GatewayError.fromError('plain string').message).toBe('plain string');
  });
});

describe('specific errors', () => {
  it('should distinguish missing and invalid keys', () => {
    expect(new AuthRejectedError('missing').status).toBe(401);
    expect(new AuthRejectedError('invalid').status).toBe(403);
  });

  it('should carry a one-day retry hint on quota errors', () => {
    const error = new QuotaExceededError('origin', 200);

    expect(error.retryAfterSeconds).toBe(86400);
    expect(error.metadata).toEqual({ scope: 'origin', limit: 200 });
  });

  it('should describe the body limit in kilobytes', () => {
    expect(new PayloadTooLargeError(10240).publicMessage).toBe(
      'Request body too large. Maximum 10KB allowed.'
    );
  });

  it('should list validation issues in the internal message', () => {
    const error = new InvalidRequestError([
      { field: 'query', message: 'query is required' },
      { field: 'body', message: 'bad' },
    ]);

    expect(error.message).toBe('Invalid request body: query: query is required; body: bad');
  });

  it('should default generation errors to not partial', () => {
    expect(new GenerationError('x').partial).toBe(false);
    expect(new GenerationError('x', { partial: true }).partial).toBe(true);
  });

  it('should name the unavailable dependency', () => {
    expect(new DependencyUnavailableError('counter store').message).toBe('counter store unavailable');
  });
});

describe('helpers', () => {
  it('should recognise gateway errors', () => {
    expect(isGatewayError(new RateLimitedError(1, 1))).toBe(true);
    expect(isGatewayError(new Error('x'))).toBe(false);
  });

  it('should normalise thrown values to Error', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });

  it('should expose only public fields in the error body', () => {
    const error = new QuotaExceededError('global', 2000);

    expect(toErrorBody(error, 'req-1')).toEqual({
      error: {
        code: 'QUOTA_EXCEEDED',
        message: 'Service is at daily capacity. Please try again tomorrow.',
        requestId: 'req-1',
        retryAfterSeconds: 86400,
      },
    });
  });

  it('should include validation errors when given', () => {
    const body = toErrorBody(new InvalidRequestError([]), 'req-2', [{ field: 'query', message: 'm' }]);

    expect(body.error.validationErrors).toEqual([{ field: 'query', message: 'm' }]);
    expect(publicMessageFor('INVALID_REQUEST')).toBe(body.error.message);
  });
});
