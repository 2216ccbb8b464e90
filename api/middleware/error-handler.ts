/**
 * Error handling
 *
 * Every failure leaves as `{ error: { code, message, requestId } }`. Gateway
 * errors carry their own status and public message; anything else is logged
 * in full and answered with a generic 500.
 */

import type { Context, NotFoundHandler } from 'hono';
import {
  GatewayError,
  GatewayErrorCode,
  InvalidRequestError,
  PayloadTooLargeError,
  isGatewayError,
  toErrorBody,
  type FieldIssue,
} from '../../lib/src/errors/index.js';
import type { Logger } from '../../lib/src/logging/index.js';
import type { GatewayEnv } from '../types.js';

const ERROR_STATUSES = [400, 401, 403, 404, 413, 429, 500, 502, 503] as const;

type ErrorStatus = (typeof ERROR_STATUSES)[number];

function toErrorStatus(status: number): ErrorStatus {
  return ERROR_STATUSES.find((known) => known === status) ?? 500;
}

export function errorResponse(
  c: Context<GatewayEnv>,
  error: GatewayError,
  validationErrors?: FieldIssue[]
): Response {
  const headers: Record<string, string> = {};
  if (error.retryAfterSeconds !== undefined) {
    headers['Retry-After'] = String(error.retryAfterSeconds);
  }
  return c.json(
    toErrorBody(error, c.get('requestId'), validationErrors),
    toErrorStatus(error.status),
    headers
  );
}

export interface ErrorHandlerOptions {
  logger: Logger;
  /** Reported when a streamed body overruns the body limit */
  maxBodyBytes: number;
}

export function createErrorHandler(options: ErrorHandlerOptions) {
  return (err: Error, c: Context<GatewayEnv>): Response => {
    const logger = c.get('logger') ?? options.logger;

    if (isGatewayError(err)) {
      if (err.status >= 500) {
        logger.error('Request failed', err, { code: err.code, path: c.req.path });
      } else {
        logger.warn('Request rejected', { code: err.code, status: err.status, path: c.req.path });
      }
      return errorResponse(
        c,
        err,
        err instanceof InvalidRequestError ? err.validationErrors : undefined
      );
    }

    // hono/body-limit raises this while reading a body sent without Content-Length
    if (err.name === 'BodyLimitError') {
      return errorResponse(c, new PayloadTooLargeError(options.maxBodyBytes));
    }

    logger.error('Unhandled error', err, { method: c.req.method, path: c.req.path });
    return errorResponse(c, GatewayError.fromError(err));
  };
}

export const notFound: NotFoundHandler<GatewayEnv> = (c) =>
  errorResponse(c, new GatewayError(`No route for ${c.req.path}`, GatewayErrorCode.NOT_FOUND));
