/**
 * index.ts
 * Main entry point for the inference gateway
 */

import 'dotenv/config';

import { createApp } from './app.js';
import { loadBackendRegistry } from './config/backend-registry.js';
import { loadGatewayConfig } from './config/config.js';
import { SHUTDOWN_FORCE_EXIT_MS } from './constants/index.js';
import { createGatewayContext, startGatewayContext, stopGatewayContext } from './gateway-context.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = await loadGatewayConfig();
  const registry = await loadBackendRegistry(config.backendsFile);
  const context = createGatewayContext({ config, registry });
  startGatewayContext(context);

  const app = createApp(context);
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Inference gateway listening on ${config.host}:${config.port}`);
    logger.info(`Backends: ${registry.names().join(', ') || '(none)'}`);
    logger.info(`Terminal feed: mode=${config.terminalFeed.mode} bus=${context.busMode}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_FORCE_EXIT_MS).unref();

    server.close(() => {
      logger.info('HTTP server closed');
      stopGatewayContext(context).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
          process.exit(1);
        }
      );
    });
    // SSE clients keep their sockets open otherwise
    context.terminalFeed.stop();
    server.closeIdleConnections();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error(`Failed to start gateway: ${getErrorMessage(error)}`, { error });
  process.exit(1);
});
