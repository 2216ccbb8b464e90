/**
 * Gateway Error Types
 *
 * Every failure that can reach a client is one of these classes. Each carries
 * a machine-readable `code`, the HTTP status it maps to, and a `publicMessage`
 * that is safe to show. The internal `message` and `cause` are for logs only.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const GatewayErrorCode = {
  /** Missing or unknown API key */
  AUTH_REJECTED: 'AUTH_REJECTED',
  /** Daily per-origin or global budget spent */
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  /** Per-minute request rate exceeded */
  RATE_LIMITED: 'RATE_LIMITED',
  /** Query longer than the character or token ceiling */
  QUERY_TOO_LARGE: 'QUERY_TOO_LARGE',
  /** Request body failed schema validation */
  INVALID_REQUEST: 'INVALID_REQUEST',
  /** Request body larger than the configured limit */
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  /** Embedding or vector search failed after retries */
  RETRIEVAL_ERROR: 'RETRIEVAL_ERROR',
  /** Model call failed, possibly after partial output */
  GENERATION_ERROR: 'GENERATION_ERROR',
  /** Counter store unreachable */
  DEPENDENCY_UNAVAILABLE: 'DEPENDENCY_UNAVAILABLE',
  NOT_FOUND: 'NOT_FOUND',
  /** Anything unclassified */
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type GatewayErrorCode =
  (typeof GatewayErrorCode)[keyof typeof GatewayErrorCode];

const PUBLIC_MESSAGES: Record<GatewayErrorCode, string> = {
  AUTH_REJECTED: 'Invalid or missing API key.',
  QUOTA_EXCEEDED: 'Daily request limit reached. Please try again tomorrow.',
  RATE_LIMITED: 'Too many requests. Please slow down.',
  QUERY_TOO_LARGE: 'Query is too long.',
  INVALID_REQUEST: 'Request body is invalid.',
  PAYLOAD_TOO_LARGE: 'Request body is too large.',
  RETRIEVAL_ERROR: 'The search service is temporarily unavailable.',
  GENERATION_ERROR: 'The answer service is temporarily unavailable.',
  DEPENDENCY_UNAVAILABLE: 'Service temporarily unavailable.',
  NOT_FOUND: 'Not found.',
  INTERNAL_ERROR: 'An unexpected error occurred.',
};

const STATUS_CODES: Record<GatewayErrorCode, number> = {
  AUTH_REJECTED: 401,
  QUOTA_EXCEEDED: 429,
  RATE_LIMITED: 429,
  QUERY_TOO_LARGE: 400,
  INVALID_REQUEST: 400,
  PAYLOAD_TOO_LARGE: 413,
  RETRIEVAL_ERROR: 502,
  GENERATION_ERROR: 502,
  DEPENDENCY_UNAVAILABLE: 503,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

export function publicMessageFor(code: GatewayErrorCode): string {
  return PUBLIC_MESSAGES[code];
}

// =============================================================================
// Base Class
// =============================================================================

export interface GatewayErrorOptions {
  cause?: unknown;
  metadata?: Record<string, unknown>;
  /** Overrides the default status for the code */
  status?: number;
  /** Overrides the default client-facing message for the code */
  publicMessage?: string;
  /** Seconds the client should wait before retrying */
  retryAfterSeconds?: number;
}

/**
 * Base error class for all gateway failures
 */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly status: number;
  readonly publicMessage: string;
  readonly retryAfterSeconds: number | undefined;
  override readonly cause: unknown;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: GatewayErrorCode,
    options: GatewayErrorOptions = {}
  ) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.status = options.status ?? STATUS_CODES[code];
    this.publicMessage = options.publicMessage ?? PUBLIC_MESSAGES[code];
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.cause = options.cause;
    this.metadata = options.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GatewayError);
    }
  }

  /**
   * Wrap anything thrown into a GatewayError. Errors that already are one
   * pass through; everything else becomes INTERNAL_ERROR with the original
   * kept as `cause`.
   */
  static fromError(
    error: unknown,
    metadata?: Record<string, unknown>
  ): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new GatewayError(message, GatewayErrorCode.INTERNAL_ERROR, {
      cause: error,
      ...(metadata !== undefined ? { metadata } : {}),
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

export type AuthRejectionReason = 'missing' | 'invalid';

/**
 * A request without a key gets 401, one with an unknown key gets 403.
 */
export class AuthRejectedError extends GatewayError {
  readonly reason: AuthRejectionReason;

  constructor(reason: AuthRejectionReason) {
    super(
      reason === 'missing' ? 'API key missing' : 'API key invalid',
      GatewayErrorCode.AUTH_REJECTED,
      {
        status: reason === 'missing' ? 401 : 403,
        publicMessage:
          reason === 'missing' ? 'API key required.' : 'Invalid API key.',
      }
    );
    this.name = 'AuthRejectedError';
    this.reason = reason;
  }
}

export type QuotaScope = 'origin' | 'global';

export const DAILY_RETRY_AFTER_SECONDS = 86400;

export class QuotaExceededError extends GatewayError {
  readonly scope: QuotaScope;
  readonly limit: number;

  constructor(scope: QuotaScope, limit: number) {
    super(`Daily ${scope} quota of ${limit} exceeded`, GatewayErrorCode.QUOTA_EXCEEDED, {
      retryAfterSeconds: DAILY_RETRY_AFTER_SECONDS,
      publicMessage:
        scope === 'origin'
          ? 'Daily request limit reached. Please try again tomorrow.'
          : 'Service is at daily capacity. Please try again tomorrow.',
      metadata: { scope, limit },
    });
    this.name = 'QuotaExceededError';
    this.scope = scope;
    this.limit = limit;
  }
}

export class RateLimitedError extends GatewayError {
  constructor(limit: number, retryAfterSeconds: number) {
    super(`Rate limit of ${limit}/minute exceeded`, GatewayErrorCode.RATE_LIMITED, {
      retryAfterSeconds,
      metadata: { limit },
    });
    this.name = 'RateLimitedError';
  }
}

export type QueryCeiling = 'characters' | 'tokens';

export class QueryTooLargeError extends GatewayError {
  readonly ceiling: QueryCeiling;

  constructor(ceiling: QueryCeiling, limit: number, actual: number) {
    super(
      `Query has ${actual} ${ceiling}, limit is ${limit}`,
      GatewayErrorCode.QUERY_TOO_LARGE,
      {
        publicMessage:
          ceiling === 'characters'
            ? `Query too long. Maximum ${limit} characters.`
            : 'Query too complex. Please shorten it.',
        metadata: { ceiling, limit, actual },
      }
    );
    this.name = 'QueryTooLargeError';
    this.ceiling = ceiling;
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Malformed JSON or a body that fails schema validation
 */
export class InvalidRequestError extends GatewayError {
  readonly validationErrors: FieldIssue[];

  constructor(validationErrors: FieldIssue[], cause?: unknown) {
    super(
      `Invalid request body: ${validationErrors.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      GatewayErrorCode.INVALID_REQUEST,
      { cause }
    );
    this.name = 'InvalidRequestError';
    this.validationErrors = validationErrors;
  }
}

export class PayloadTooLargeError extends GatewayError {
  constructor(maxBytes: number) {
    super(`Request body over ${maxBytes} bytes`, GatewayErrorCode.PAYLOAD_TOO_LARGE, {
      publicMessage: `Request body too large. Maximum ${Math.floor(maxBytes / 1024)}KB allowed.`,
      metadata: { maxBytes },
    });
    this.name = 'PayloadTooLargeError';
  }
}

export class RetrievalError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, GatewayErrorCode.RETRIEVAL_ERROR, { cause });
    this.name = 'RetrievalError';
  }
}

export class GenerationError extends GatewayError {
  /** Whether fragments were already delivered before the failure */
  readonly partial: boolean;

  constructor(message: string, options: { cause?: unknown; partial?: boolean } = {}) {
    super(message, GatewayErrorCode.GENERATION_ERROR, { cause: options.cause });
    this.name = 'GenerationError';
    this.partial = options.partial ?? false;
  }
}

export class DependencyUnavailableError extends GatewayError {
  readonly dependency: string;

  constructor(dependency: string, cause?: unknown) {
    super(`${dependency} unavailable`, GatewayErrorCode.DEPENDENCY_UNAVAILABLE, {
      cause,
      metadata: { dependency },
    });
    this.name = 'DependencyUnavailableError';
    this.dependency = dependency;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Normalize a thrown value to an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Client-visible error body. Never contains the internal message or cause.
 */
export interface ErrorBody {
  error: {
    code: GatewayErrorCode;
    message: string;
    requestId: string;
    retryAfterSeconds?: number;
    validationErrors?: FieldIssue[];
  };
}

export function toErrorBody(
  error: GatewayError,
  requestId: string,
  validationErrors?: FieldIssue[]
): ErrorBody {
  return {
    error: {
      code: error.code,
      message: error.publicMessage,
      requestId,
      ...(error.retryAfterSeconds !== undefined
        ? { retryAfterSeconds: error.retryAfterSeconds }
        : {}),
      ...(validationErrors !== undefined ? { validationErrors } : {}),
    },
  };
}
