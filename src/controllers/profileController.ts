/**
 * profileController.ts
 * Model profile schema, CRUD and apply
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import type { GatewayContext } from '../gateway-context.js';
import type { ModelFamily } from '../gateway.types.js';
import { sendError } from '../middleware/errorHandler.js';
import type { ProfileValues } from '../model-profile-store.js';
import { buildProfileSchema, inferModelFamily, validateProfileValues } from '../profile-schema.js';
import { GatewayError, RequestValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ProfileView {
  model_id: string;
  family: ModelFamily;
  values: ProfileValues;
  updated_at: string | null;
}

export type ApplyLoadResult =
  | { success: true; status: 'loaded' }
  | { success: false; status_code: number; error: string };

const putProfileSchema = z.object({
  values: z.record(z.unknown()),
  replace: z.boolean().optional(),
});

const applyProfileSchema = z.object({
  load_model: z.boolean().optional(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new RequestValidationError('Invalid request body', result.error.issues);
  }
  return result.data;
}

async function buildProfileView(context: GatewayContext, modelId: string): Promise<ProfileView> {
  const entry = await context.profiles.getEntry(modelId);
  return {
    model_id: modelId,
    family: inferModelFamily(modelId),
    values: entry?.values ?? {},
    updated_at: entry?.updated_at ?? null,
  };
}

/**
 * GET /models/:id/schema
 */
export function getProfileSchema() {
  return (req: Request, res: Response): void => {
    res.json(buildProfileSchema(req.params.id));
  };
}

/**
 * GET /models/:id/profile
 */
export function getProfile(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await buildProfileView(context, req.params.id));
    } catch (error) {
      sendError(res, error, 'profile read');
    }
  };
}

/**
 * PUT /models/:id/profile
 */
export function putProfile(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const modelId = req.params.id;
      const body = parseBody(putProfileSchema, req.body);
      const updates = validateProfileValues(inferModelFamily(modelId), body.values);
      const replace = body.replace ?? false;
      await context.profiles.setProfile(modelId, updates, replace);
      logger.info(`Profile ${replace ? 'replaced' : 'updated'} for ${modelId}`, {
        fields: Object.keys(updates),
      });
      res.json(await buildProfileView(context, modelId));
    } catch (error) {
      sendError(res, error, 'profile update');
    }
  };
}

/**
 * POST /models/:id/profile/apply
 */
export function applyProfile(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const modelId = req.params.id;
      const body = parseBody(applyProfileSchema, req.body);
      const values = await context.profiles.getProfile(modelId);
      if (!body.load_model) {
        res.json({ model_id: modelId, values });
        return;
      }

      let load: ApplyLoadResult;
      try {
        await context.orchestrator.ensureModelLoaded(modelId);
        load = { success: true, status: 'loaded' };
      } catch (error) {
        if (!(error instanceof GatewayError)) {
          throw error;
        }
        load = { success: false, status_code: error.statusCode, error: error.message };
      }
      res.json({ model_id: modelId, values, load });
    } catch (error) {
      sendError(res, error, 'profile apply');
    }
  };
}
