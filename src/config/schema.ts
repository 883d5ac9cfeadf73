/**
 * schema.ts
 * Centralized Zod configuration schema with validation
 */

import { z } from 'zod';

/**
 * A single backend in the registry file
 */
export const backendEntrySchema = z.object({
  url: z
    .string()
    .url()
    .transform(url => url.replace(/\/+$/, '')),
  health: z.string().startsWith('/').default('/health'),
});

export const backendRegistrySchema = z.object({
  backends: z.record(z.string().min(1), backendEntrySchema).default({}),
});

/**
 * Which registry entry serves each route family
 */
export const routingConfigSchema = z
  .object({
    llm: z.string().min(1).default('llm'),
    embeddings: z.string().min(1).default('embeddings'),
    tts: z.string().min(1).default('tts'),
    stt: z.string().min(1).default('stt'),
    speakers: z.string().min(1).default('speaker'),
    audio: z.string().min(1).default('audio'),
  })
  .default({});

/**
 * Per-class request timeouts in milliseconds
 */
export const timeoutsConfigSchema = z
  .object({
    llm: z.number().int().positive().default(300000),
    embeddings: z.number().int().positive().default(60000),
    tts: z.number().int().positive().default(120000),
    stt: z.number().int().positive().default(600000),
    speaker: z.number().int().positive().default(600000),
    audio: z.number().int().positive().default(600000),
    default: z.number().int().positive().default(60000),
  })
  .default({});

export const circuitBreakerConfigSchema = z
  .object({
    threshold: z.number().int().min(1).default(5),
    cooldownMs: z.number().int().min(0).default(30000),
  })
  .default({});

export const retryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(1).max(20).default(3),
    delaysMs: z.array(z.number().int().min(0)).min(1).default([500, 1000, 2000]),
  })
  .default({});

export const poolConfigSchema = z
  .object({
    connections: z.number().int().min(1).default(100),
    keepAliveTimeoutMs: z.number().int().min(0).default(20000),
    connectTimeoutMs: z.number().int().positive().default(10000),
  })
  .default({});

export const modelsConfigSchema = z
  .object({
    pollIntervalMs: z.number().int().positive().default(1000),
    loadTimeoutMs: z.number().int().positive().default(240000),
    generalModel: z.string().min(1).default('gpt-oss-20b'),
    coderModel: z.string().min(1).default('qwen3-coder-30b'),
    autoAliases: z.array(z.string()).default(['auto', 'default', 'router', '']),
    serializeLoads: z.boolean().default(true),
  })
  .default({});

export const profilesConfigSchema = z
  .object({
    path: z.string().min(1).default('./data/model-profiles.json'),
  })
  .default({});

export const securityConfigSchema = z
  .object({
    corsOrigins: z.array(z.string()).default(['*']),
    rateLimitWindowMs: z.number().int().min(1000).default(60000),
    rateLimitMax: z.number().int().min(1).default(60),
  })
  .default({});

export const terminalLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']);

export const terminalFeedConfigSchema = z
  .object({
    mode: z.enum(['live', 'off']).default('live'),
    bufferSize: z.number().int().min(10).default(2000),
    subscriberQueueSize: z.number().int().min(10).default(256),
    maxLineChars: z.number().int().min(256).default(4000),
    defaultLevel: terminalLevelSchema.default('INFO'),
    backlogLines: z.number().int().min(1).max(500).default(200),
    keepaliveSeconds: z.number().int().min(5).default(15),
    instanceId: z.string().min(1).max(120).optional(),
    redactExtraPatterns: z.string().default(''),
    busMode: z.string().default('local'),
    redisUrl: z.string().optional(),
    redisChannel: z.string().min(1).default('gateway:terminal_feed'),
    redisConnectTimeoutMs: z.number().int().positive().default(5000),
  })
  .default({});

/**
 * Complete gateway configuration schema
 */
export const gatewayConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  backendsFile: z.string().default('./config/backends.yaml'),
  routing: routingConfigSchema,
  timeouts: timeoutsConfigSchema,
  circuitBreaker: circuitBreakerConfigSchema,
  retry: retryConfigSchema,
  pool: poolConfigSchema,
  models: modelsConfigSchema,
  profiles: profilesConfigSchema,
  security: securityConfigSchema,
  terminalFeed: terminalFeedConfigSchema,
});

export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof gatewayConfigSchema>;
export type BackendEntry = z.infer<typeof backendEntrySchema>;
export type RoutingConfig = z.infer<typeof routingConfigSchema>;
export type TimeoutsConfig = z.infer<typeof timeoutsConfigSchema>;
export type ModelsConfig = z.infer<typeof modelsConfigSchema>;
export type TerminalFeedConfig = z.infer<typeof terminalFeedConfigSchema>;
export type PoolConfig = z.infer<typeof poolConfigSchema>;
export type RetryConfig = z.infer<typeof retryConfigSchema>;
