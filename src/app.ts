/**
 * app.ts
 * Express application wiring for the gateway
 */

import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';

import type { GatewayContext } from './gateway-context.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createGatewayRouter, createMediaRouter } from './routes/gateway.js';
import { logger } from './utils/logger.js';

export function createApp(context: GatewayContext): Express {
  const app = express();
  const origins = context.config.security.corsOrigins;

  app.use(helmet({ contentSecurityPolicy: false, crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(cors({ origin: origins.includes('*') ? '*' : origins }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.use(createMediaRouter(context));

  app.use(express.json({ limit: '10mb' }));
  app.use(createGatewayRouter(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
