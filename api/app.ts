/**
 * Gateway HTTP application
 *
 * Builds the Hono app from already-constructed services. Middleware order:
 * request context, security headers, CORS, body size limit; each route group
 * then adds its own authentication and admission checks.
 *
 * @example
 * ```typescript
 * const app = createApp(deps);
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import type { BudgetLimiter, RateLimiter } from '../lib/src/admission/index.js';
import type { GatewayConfig } from '../lib/src/config/index.js';
import { PayloadTooLargeError } from '../lib/src/errors/index.js';
import type { Logger } from '../lib/src/logging/index.js';
import type { ChatService } from '../lib/src/rag/index.js';
import { dailyBudget, rateLimit } from './middleware/admission.js';
import { apiKeyAuth } from './middleware/auth.js';
import { createErrorHandler, notFound } from './middleware/error-handler.js';
import { REQUEST_ID_HEADER, requestContext } from './middleware/request-context.js';
import { createChatRoutes } from './routes/chat.js';
import { createHealthRoutes, type Pingable } from './routes/health.js';
import { createUsageRoutes } from './routes/usage.js';
import type { GatewayEnv } from './types.js';

export interface AppDeps {
  config: GatewayConfig;
  logger: Logger;
  chat: ChatService;
  budget: BudgetLimiter;
  rateLimiter: RateLimiter;
  store: Pingable;
  index: Pingable;
  /** Process start, epoch milliseconds */
  startedAt?: number;
}

export function createApp(deps: AppDeps): Hono<GatewayEnv> {
  const { config, logger } = deps;
  const app = new Hono<GatewayEnv>();

  // ===========================================================================
  // Global middleware
  // ===========================================================================

  app.use('*', requestContext({ logger, trustProxy: config.server.trustProxy }));
  app.use(
    '*',
    secureHeaders({
      strictTransportSecurity: 'max-age=63072000; includeSubDomains',
      xFrameOptions: 'DENY',
      xXssProtection: '1; mode=block',
      referrerPolicy: 'strict-origin-when-cross-origin',
    })
  );
  app.use(
    '*',
    cors({
      origin: config.cors.allowedOrigins,
      allowMethods: ['GET', 'POST'],
      allowHeaders: [config.auth.headerName, 'Content-Type', REQUEST_ID_HEADER],
      exposeHeaders: [REQUEST_ID_HEADER, 'Retry-After', 'X-Cache'],
      credentials: true,
      maxAge: 600,
    })
  );
  app.use(
    '/api/*',
    bodyLimit({
      maxSize: config.limits.maxBodyBytes,
      onError: () => {
        throw new PayloadTooLargeError(config.limits.maxBodyBytes);
      },
    })
  );

  // ===========================================================================
  // Routes
  // ===========================================================================

  const auth = apiKeyAuth({ apiKeys: config.auth.apiKeys, headerName: config.auth.headerName });
  const defaultRateLimit = rateLimit(deps.rateLimiter, {
    bucket: 'default',
    limit: config.limits.defaultPerMinute,
  });

  const health = createHealthRoutes({
    version: config.server.version,
    startedAt: deps.startedAt ?? Date.now(),
    store: deps.store,
    index: deps.index,
    logger: logger.child('health'),
  });
  app.route('/health', health);
  app.route('/api/v1/health', health);

  app.route(
    '/api/v1/chat',
    createChatRoutes(deps.chat, {
      auth,
      rateLimit: rateLimit(deps.rateLimiter, {
        bucket: 'chat',
        limit: config.limits.chatPerMinute,
      }),
      dailyBudget: dailyBudget(deps.budget),
    })
  );

  app.route(
    '/api/v1/usage',
    createUsageRoutes({ budget: deps.budget, chat: deps.chat, auth, rateLimit: defaultRateLimit })
  );

  app.notFound(notFound);
  app.onError(createErrorHandler({ logger, maxBodyBytes: config.limits.maxBodyBytes }));

  return app;
}
