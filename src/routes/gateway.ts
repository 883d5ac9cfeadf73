/**
 * gateway.ts
 * Gateway routes - inference, model management, media passthrough and the terminal feed
 */

import express, { Router } from 'express';

import { handleChatCompletions, handleEmbeddings } from '../controllers/chatController.js';
import { getBreakers, getHealth } from '../controllers/healthController.js';
import { proxyMedia, type MediaFamily } from '../controllers/mediaController.js';
import { listModels, loadModel, unloadModel } from '../controllers/modelsController.js';
import {
  applyProfile,
  getProfile,
  getProfileSchema,
  putProfile,
} from '../controllers/profileController.js';
import { getTerminalStats, streamTerminalEvents } from '../controllers/terminalController.js';
import type { GatewayContext } from '../gateway-context.js';
import { createRateLimiter } from '../middleware/rateLimiter.js';

const MEDIA_BODY_LIMIT = '100mb';
const MEDIA_FAMILIES: readonly MediaFamily[] = ['tts', 'stt', 'speakers', 'audio'];

/**
 * Media passthrough. Mounted ahead of the JSON body parser so request bodies
 * reach the backend untouched.
 */
export function createMediaRouter(context: GatewayContext): Router {
  const router = Router();
  for (const family of MEDIA_FAMILIES) {
    const familyRouter = Router();
    familyRouter.use(express.raw({ type: '*/*', limit: MEDIA_BODY_LIMIT }));
    if (family === 'tts') {
      familyRouter.get('/languages', proxyMedia(context, family));
    }
    familyRouter.post('/*', proxyMedia(context, family));
    router.use(`/${family}`, familyRouter);
  }
  return router;
}

export function createGatewayRouter(context: GatewayContext): Router {
  const router = Router();
  const { security } = context.config;
  const adminRateLimiter = createRateLimiter({
    windowMs: security.rateLimitWindowMs,
    maxRequests: security.rateLimitMax,
  });

  // Health
  router.get('/health', getHealth(context));
  router.get('/health/breakers', getBreakers(context));

  // OpenAI compatible
  router.post('/v1/chat/completions', handleChatCompletions(context));
  router.post('/v1/embeddings', handleEmbeddings(context));

  // Model management
  router.get('/models', listModels(context));
  router.post('/models/load', adminRateLimiter, loadModel(context));
  router.post('/models/unload', adminRateLimiter, unloadModel(context));
  router.get('/models/:id/schema', getProfileSchema());
  router.get('/models/:id/profile', getProfile(context));
  router.put('/models/:id/profile', adminRateLimiter, putProfile(context));
  router.post('/models/:id/profile/apply', adminRateLimiter, applyProfile(context));

  // Terminal feed
  router.get('/events/terminal/stats', getTerminalStats(context));
  router.get('/events/terminal', streamTerminalEvents(context));

  return router;
}
