/**
 * LLM Error Types
 *
 * Provider errors mapped to a small set of classes. `retryable` drives the
 * adapter's retry loop; the generation client turns whatever escapes into a
 * GenerationError.
 */

import { type LLMProvider, type LLMErrorInfo, LLMErrorCode } from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message,
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Provider rate limit hit. Retryable after `retryAfterMs`.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 60000,
      originalError,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Bad or missing provider key. Not retryable.
 */
export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.AUTH_ERROR,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_REQUEST,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidRequestError';
  }
}

export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';
  }
}

export class TimeoutError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'TimeoutError';
  }
}

export class ServerError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'ServerError';
  }
}

export class NetworkError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'NetworkError';
  }
}

/**
 * The caller cancelled the request. Never retried.
 */
export class AbortedError extends LLMError {
  constructor(provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.ABORTED,
      message: 'Request aborted',
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AbortedError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isRetryableError(error: unknown): boolean {
  return isLLMError(error) && error.retryable;
}

export function getRetryAfterMs(error: unknown): number | undefined {
  return isLLMError(error) ? error.retryAfterMs : undefined;
}
