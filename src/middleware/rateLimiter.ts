/**
 * rateLimiter.ts
 * Rate limiting for the model management endpoints
 */

import type { Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { ERROR_MESSAGES } from '../constants/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

/**
 * Requests are keyed by client IP. Exceeding the limit answers 429.
 */
export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      log.warn(`Rate limit exceeded for ${req.ip ?? 'unknown'}`, {
        path: req.path,
        method: req.method,
      });

      res.status(429).json({
        error: ERROR_MESSAGES.TOO_MANY_REQUESTS,
        retryAfter: Math.ceil(config.windowMs / 1000),
      });
    },
  });
}
