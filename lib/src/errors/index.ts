/**
 * Errors Module
 */

export {
  GatewayErrorCode,
  GatewayError,
  type GatewayErrorOptions,
  AuthRejectedError,
  type AuthRejectionReason,
  QuotaExceededError,
  type QuotaScope,
  DAILY_RETRY_AFTER_SECONDS,
  RateLimitedError,
  QueryTooLargeError,
  type QueryCeiling,
  type FieldIssue,
  InvalidRequestError,
  PayloadTooLargeError,
  RetrievalError,
  GenerationError,
  DependencyUnavailableError,
  isGatewayError,
  toError,
  publicMessageFor,
  toErrorBody,
  type ErrorBody,
} from './gateway-error.js';
