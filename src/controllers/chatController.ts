/**
 * chatController.ts
 * OpenAI-compatible chat completions and embeddings
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { ERROR_MESSAGES } from '../constants/index.js';
import type { GatewayContext } from '../gateway-context.js';
import type { ChatCompletionRequest } from '../gateway.types.js';
import { sendError } from '../middleware/errorHandler.js';
import { relayStream, sendBackendJson } from '../streaming.js';
import { RequestValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('llm');

const chatRequestSchema = z
  .object({
    model: z.unknown().optional(),
    stream: z.unknown().optional(),
    messages: z.array(z.object({ role: z.string() }).passthrough(), {
      required_error: ERROR_MESSAGES.MESSAGES_REQUIRED,
      invalid_type_error: ERROR_MESSAGES.MESSAGES_REQUIRED,
    }),
  })
  .passthrough();

export function parseChatRequest(body: unknown): ChatCompletionRequest {
  const result = chatRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(ERROR_MESSAGES.INVALID_REQUEST, result.error.issues);
  }
  return result.data;
}

/**
 * POST /v1/chat/completions
 */
export function handleChatCompletions(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const prepared = await context.orchestrator.prepareChatRequest(parseChatRequest(req.body));
      const backend = context.config.routing.llm;
      const url = `${context.registry.url(backend)}/v1/chat/completions`;

      if (prepared.payload.stream === true) {
        const upstream = await context.client.stream(backend, 'POST', url, {
          json: prepared.payload,
          timeoutClass: 'llm',
        });
        if (upstream.status >= 400) {
          sendBackendJson(res, await upstream.readAll(), ERROR_MESSAGES.BACKEND_ERROR);
          return;
        }
        log.debug(`Streaming chat completion from ${prepared.model}`);
        await relayStream(res, upstream);
        return;
      }

      const response = await context.client.request(backend, 'POST', url, {
        json: prepared.payload,
        timeoutClass: 'llm',
      });
      sendBackendJson(res, response, ERROR_MESSAGES.BACKEND_ERROR);
    } catch (error) {
      sendError(res, error, 'chat completion');
    }
  };
}

/**
 * POST /v1/embeddings
 */
export function handleEmbeddings(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const backend = context.config.routing.embeddings;
      const response = await context.client.request(
        backend,
        'POST',
        `${context.registry.url(backend)}/v1/embeddings`,
        { json: req.body ?? {}, timeoutClass: 'embeddings' }
      );
      sendBackendJson(res, response, ERROR_MESSAGES.BACKEND_ERROR);
    } catch (error) {
      sendError(res, error, 'embeddings');
    }
  };
}
