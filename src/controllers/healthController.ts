/**
 * healthController.ts
 * Aggregated backend health and circuit breaker state
 */

import type { Request, Response } from 'express';
import type { BackendHealth } from '../backend-client.js';
import type { GatewayContext } from '../gateway-context.js';
import { sendError } from '../middleware/errorHandler.js';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  backends: Record<string, BackendHealth>;
}

/**
 * Probe every registered backend. Unreachable backends degrade the report
 * rather than failing it.
 */
export async function collectHealth(context: GatewayContext): Promise<HealthReport> {
  const entries = context.registry.entries();
  const results = await Promise.all(
    entries.map(([name, backend]) => context.client.healthCheck(name, `${backend.url}${backend.health}`))
  );
  const backends: Record<string, BackendHealth> = {};
  entries.forEach(([name], index) => {
    backends[name] = results[index];
  });
  const allHealthy = results.every(result => result.status === 'healthy');
  return { status: allHealthy ? 'healthy' : 'degraded', backends };
}

/**
 * GET /health
 */
export function getHealth(context: GatewayContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await collectHealth(context));
    } catch (error) {
      sendError(res, error, 'health check');
    }
  };
}

/**
 * GET /health/breakers
 */
export function getBreakers(context: GatewayContext) {
  return (_req: Request, res: Response): void => {
    res.json({ breakers: context.breakers.getAllStats() });
  };
}
