/**
 * config.ts
 * Gateway configuration assembly: schema defaults, optional JSON/YAML file,
 * then GATEWAY_* environment overrides, validated as a whole.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { isPlainObject } from '../utils/json-utils.js';
import { applyEnvOverrides } from './envMapper.js';
import { gatewayConfigSchema, type GatewayConfig } from './schema.js';

export interface ValidationError {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      `Configuration validation failed: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`
    );
    this.errors = errors;
    this.name = 'ConfigValidationError';
  }
}

export function toValidationErrors(error: ZodError): ValidationError[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Read a JSON or YAML document from disk
 */
export async function readStructuredFile(filePath: string): Promise<unknown> {
  const resolvedPath = path.resolve(filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const ext = path.extname(resolvedPath).toLowerCase();

  if (ext === '.json') {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }
  if (ext === '.yaml' || ext === '.yml') {
    const yaml = await import('js-yaml');
    return yaml.load(content);
  }
  throw new Error(`Unsupported config file format: ${ext}. Use .json, .yaml, or .yml`);
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build and validate the gateway configuration
 */
export async function loadGatewayConfig(options: LoadConfigOptions = {}): Promise<GatewayConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.GATEWAY_CONFIG_FILE;
  let raw: Record<string, unknown> = {};

  if (configPath) {
    const parsed = await readStructuredFile(configPath);
    if (isPlainObject(parsed)) {
      raw = parsed;
    } else if (parsed !== undefined && parsed !== null) {
      throw new ConfigValidationError([{ path: '(root)', message: 'Expected an object' }]);
    }
    logger.info(`Configuration loaded from ${path.resolve(configPath)}`);
  }

  applyEnvOverrides(raw, env);
  return parseGatewayConfig(raw);
}

/**
 * Validate a raw config object, filling defaults
 */
export function parseGatewayConfig(raw: unknown): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(toValidationErrors(result.error));
  }
  return result.data;
}
