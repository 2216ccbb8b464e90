/**
 * Gateway entry point
 *
 * Loads configuration, builds the services and serves the app on Node's HTTP
 * server. SIGTERM and SIGINT stop accepting connections, then close the
 * shared store.
 */

import { serve } from '@hono/node-server';
import { loadGatewayConfig } from '../lib/src/config/index.js';
import { toError } from '../lib/src/errors/index.js';
import { createLogger } from '../lib/src/logging/index.js';
import { createApp } from './app.js';
import { createContainer } from './container.js';

async function main(): Promise<void> {
  const config = loadGatewayConfig(process.env);
  const logger = createLogger('gateway', {
    level: config.logging.level,
    format: config.logging.format,
  });

  if (config.auth.apiKeys.length === 0) {
    logger.warn('API_KEYS is empty; authenticated routes will reject every request');
  }

  const container = await createContainer(config, logger);
  const app = createApp(container.deps);

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info('Gateway listening', {
        address: info.address,
        port: info.port,
        version: config.server.version,
      });
    }
  );

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      container.close().then(
        () => {
          logger.info('Shutdown complete');
          process.exit(0);
        },
        (error: unknown) => {
          logger.error('Shutdown failed', toError(error));
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Gateway failed to start:', toError(error).message);
  process.exit(1);
});
