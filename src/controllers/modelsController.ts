/**
 * modelsController.ts
 * Model registry view and load/unload commands for the LLM backend
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import type { BackendResponse } from '../backend-client.js';
import { ERROR_MESSAGES } from '../constants/index.js';
import type { GatewayContext } from '../gateway-context.js';
import type { LogicalModel, ModelFamily, ModelStatus } from '../gateway.types.js';
import { sendError } from '../middleware/errorHandler.js';
import type { ProfileValues } from '../model-profile-store.js';
import { parseRuntimeArgs } from '../model-registry.js';
import { inferModelFamily } from '../profile-schema.js';
import { sendBackendJson } from '../streaming.js';
import { RequestValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ModelView {
  id: string;
  object: 'model';
  status: ModelStatus;
  parts?: string[];
  runtime: Record<string, string>;
  family: ModelFamily;
  profile_defaults: ProfileValues;
}

const modelCommandSchema = z.object({
  model: z.string({
    required_error: ERROR_MESSAGES.MODEL_REQUIRED,
    invalid_type_error: ERROR_MESSAGES.MODEL_REQUIRED,
  }).trim().min(1, ERROR_MESSAGES.MODEL_REQUIRED),
});

function parseModelCommand(body: unknown): string {
  const result = modelCommandSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new RequestValidationError(ERROR_MESSAGES.MODEL_REQUIRED, result.error.issues);
  }
  return result.data.model;
}

export function toModelView(model: LogicalModel, profiles: Record<string, ProfileValues>): ModelView {
  const view: ModelView = {
    id: model.id,
    object: 'model',
    status: model.status,
    runtime: parseRuntimeArgs(model.status.args),
    family: inferModelFamily(model.id),
    profile_defaults: profiles[model.id] ?? {},
  };
  if (model.parts) {
    view.parts = model.parts;
  }
  return view;
}

/**
 * GET /models
 */
export function listModels(context: GatewayContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const [models, profiles] = await Promise.all([
        context.orchestrator.listModels(),
        context.profiles.listProfiles(),
      ]);
      res.json({ object: 'list', data: models.map(model => toModelView(model, profiles)) });
    } catch (error) {
      sendError(res, error, 'model list');
    }
  };
}

/**
 * POST /models/load
 */
export function loadModel(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const model = parseModelCommand(req.body);
      await context.orchestrator.ensureModelLoaded(model);
      logger.info(`Model ${model} loaded on request`);
      res.json({ model, status: 'loaded' });
    } catch (error) {
      sendError(res, error, 'model load');
    }
  };
}

/**
 * The first failed part response, otherwise the last one
 */
function pickUnloadResponse(responses: BackendResponse[]): BackendResponse | undefined {
  return responses.find(response => !response.ok) ?? responses[responses.length - 1];
}

/**
 * POST /models/unload
 */
export function unloadModel(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const model = parseModelCommand(req.body);
      const response = pickUnloadResponse(await context.orchestrator.unloadModel(model));
      if (!response) {
        res.json({ model, status: 'unloaded' });
        return;
      }
      sendBackendJson(res, response, ERROR_MESSAGES.BACKEND_ERROR);
    } catch (error) {
      sendError(res, error, 'model unload');
    }
  };
}
