/**
 * API key authentication
 *
 * No key is 401, an unknown key is 403. Keys are compared through their
 * SHA-256 digests with a constant-time comparison. An empty key list rejects
 * every request.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { AuthRejectedError } from '../../lib/src/errors/index.js';
import type { GatewayEnv } from '../types.js';

export interface ApiKeyAuthOptions {
  apiKeys: readonly string[];
  headerName: string;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function apiKeyAuth(options: ApiKeyAuthOptions) {
  const accepted = options.apiKeys.map(digest);

  return createMiddleware<GatewayEnv>(async (c, next) => {
    const presented = c.req.header(options.headerName);
    if (!presented) {
      throw new AuthRejectedError('missing');
    }

    const candidate = digest(presented);
    if (!accepted.some((key) => timingSafeEqual(key, candidate))) {
      c.get('logger').warn('Rejected unknown API key', { client: c.get('clientId') });
      throw new AuthRejectedError('invalid');
    }

    await next();
  });
}
