/**
 * Hono environment shared by the app, its middleware and its routes
 */

import type { Logger } from '../lib/src/logging/index.js';

/**
 * The part of the @hono/node-server bindings the gateway reads. Optional so
 * the app also runs under `app.request()` in tests.
 */
export type GatewayBindings = {
  incoming?: { socket: { remoteAddress?: string | undefined } } | undefined;
};

export type GatewayVariables = {
  requestId: string;
  /** Request-scoped logger carrying the request id */
  logger: Logger;
  /** Origin identity used for rate limits and daily budgets */
  clientId: string;
};

export type GatewayEnv = {
  Bindings: GatewayBindings;
  Variables: GatewayVariables;
};
