/**
 * Request context middleware
 *
 * Assigns the request id (reusing a well-formed incoming X-Request-ID),
 * derives the request logger, resolves the client identity and logs one
 * line per completed request.
 */

import { createMiddleware } from 'hono/factory';
import type { Logger } from '../../lib/src/logging/index.js';
import { generateRequestId } from '../../lib/src/rag/index.js';
import type { GatewayEnv } from '../types.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

export interface RequestContextOptions {
  logger: Logger;
  /** Use the first X-Forwarded-For address as the client identity */
  trustProxy: boolean;
}

export function requestContext(options: RequestContextOptions) {
  return createMiddleware<GatewayEnv>(async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : generateRequestId();
    const clientId = resolveClientId(
      options.trustProxy ? c.req.header('X-Forwarded-For') : undefined,
      c.env?.incoming?.socket.remoteAddress
    );
    const logger = options.logger.with({ requestId });

    c.set('requestId', requestId);
    c.set('clientId', clientId);
    c.set('logger', logger);
    c.header(REQUEST_ID_HEADER, requestId);

    const startedAt = Date.now();
    await next();

    logger.info('Request completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      client: clientId,
      durationMs: Date.now() - startedAt,
    });
  });
}

/**
 * First forwarded address when present, else the socket peer, else 'unknown'
 */
export function resolveClientId(
  forwardedFor: string | undefined,
  remoteAddress: string | undefined
): string {
  const forwarded = forwardedFor?.split(',')[0]?.trim();
  if (forwarded) {
    return forwarded;
  }
  return remoteAddress ?? 'unknown';
}
