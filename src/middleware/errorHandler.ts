/**
 * errorHandler.ts
 * Maps errors to the gateway's JSON error envelope
 */

import type { NextFunction, Request, Response } from 'express';
import { ERROR_MESSAGES } from '../constants/index.js';
import { GatewayError } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';

/**
 * Send the response for an error raised inside a controller
 */
export function sendError(res: Response, error: unknown, context = 'request'): void {
  if (res.headersSent) {
    logger.warn(`Error after response started (${context}): ${getErrorMessage(error)}`);
    if (!res.writableEnded) {
      res.end();
    }
    return;
  }

  if (error instanceof GatewayError) {
    if (error.statusCode >= 500) {
      logger.warn(`${context} failed: ${error.message}`);
    }
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  logger.error(`Unhandled error in ${context}:`, {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  res.status(500).json({ error: ERROR_MESSAGES.INTERNAL_SERVER_ERROR });
}

function bodyParserStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error) || !('status' in error)) {
    return undefined;
  }
  return typeof error.type === 'string' && typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Terminal express error middleware: malformed bodies and anything a handler let escape
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = bodyParserStatus(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({
      error: status === 400 ? ERROR_MESSAGES.INVALID_JSON : ERROR_MESSAGES.INVALID_REQUEST,
      detail: getErrorMessage(err),
    });
    return;
  }
  sendError(res, err, `${req.method} ${req.path}`);
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
