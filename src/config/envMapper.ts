/**
 * envMapper.ts
 * Maps environment variables to configuration paths
 */

import { logger } from '../utils/logger.js';
import { isPlainObject } from '../utils/json-utils.js';

type EnvValueKind = 'string' | 'number' | 'boolean' | 'list';

interface EnvMapping {
  path: string;
  kind: EnvValueKind;
}

/**
 * Environment variable to config path mapping
 */
export const ENV_CONFIG_MAPPING: Record<string, EnvMapping> = {
  // Server settings
  GATEWAY_PORT: { path: 'port', kind: 'number' },
  GATEWAY_HOST: { path: 'host', kind: 'string' },
  GATEWAY_BACKENDS_FILE: { path: 'backendsFile', kind: 'string' },

  // Routing
  GATEWAY_ROUTE_LLM: { path: 'routing.llm', kind: 'string' },
  GATEWAY_ROUTE_EMBEDDINGS: { path: 'routing.embeddings', kind: 'string' },
  GATEWAY_ROUTE_TTS: { path: 'routing.tts', kind: 'string' },
  GATEWAY_ROUTE_STT: { path: 'routing.stt', kind: 'string' },
  GATEWAY_ROUTE_SPEAKERS: { path: 'routing.speakers', kind: 'string' },
  GATEWAY_ROUTE_AUDIO: { path: 'routing.audio', kind: 'string' },

  // Timeouts
  GATEWAY_TIMEOUT_LLM_MS: { path: 'timeouts.llm', kind: 'number' },
  GATEWAY_TIMEOUT_EMBEDDINGS_MS: { path: 'timeouts.embeddings', kind: 'number' },
  GATEWAY_TIMEOUT_TTS_MS: { path: 'timeouts.tts', kind: 'number' },
  GATEWAY_TIMEOUT_STT_MS: { path: 'timeouts.stt', kind: 'number' },
  GATEWAY_TIMEOUT_SPEAKER_MS: { path: 'timeouts.speaker', kind: 'number' },
  GATEWAY_TIMEOUT_AUDIO_MS: { path: 'timeouts.audio', kind: 'number' },
  GATEWAY_TIMEOUT_DEFAULT_MS: { path: 'timeouts.default', kind: 'number' },

  // Circuit breaker and retry
  GATEWAY_CB_THRESHOLD: { path: 'circuitBreaker.threshold', kind: 'number' },
  GATEWAY_CB_COOLDOWN_MS: { path: 'circuitBreaker.cooldownMs', kind: 'number' },
  GATEWAY_RETRY_MAX_RETRIES: { path: 'retry.maxRetries', kind: 'number' },
  GATEWAY_RETRY_DELAYS_MS: { path: 'retry.delaysMs', kind: 'list' },

  // Connection pool
  GATEWAY_POOL_CONNECTIONS: { path: 'pool.connections', kind: 'number' },
  GATEWAY_POOL_KEEPALIVE_MS: { path: 'pool.keepAliveTimeoutMs', kind: 'number' },
  GATEWAY_POOL_CONNECT_TIMEOUT_MS: { path: 'pool.connectTimeoutMs', kind: 'number' },

  // Model orchestration
  GATEWAY_MODEL_POLL_INTERVAL_MS: { path: 'models.pollIntervalMs', kind: 'number' },
  GATEWAY_MODEL_LOAD_TIMEOUT_MS: { path: 'models.loadTimeoutMs', kind: 'number' },
  GATEWAY_MODEL_GENERAL: { path: 'models.generalModel', kind: 'string' },
  GATEWAY_MODEL_CODER: { path: 'models.coderModel', kind: 'string' },
  GATEWAY_MODEL_AUTO_ALIASES: { path: 'models.autoAliases', kind: 'list' },
  GATEWAY_MODEL_SERIALIZE_LOADS: { path: 'models.serializeLoads', kind: 'boolean' },

  // Profiles
  GATEWAY_PROFILES_PATH: { path: 'profiles.path', kind: 'string' },

  // Security
  GATEWAY_CORS_ORIGINS: { path: 'security.corsOrigins', kind: 'list' },
  GATEWAY_RATE_LIMIT_WINDOW_MS: { path: 'security.rateLimitWindowMs', kind: 'number' },
  GATEWAY_RATE_LIMIT_MAX: { path: 'security.rateLimitMax', kind: 'number' },

  // Terminal feed
  GATEWAY_TERMINAL_MODE: { path: 'terminalFeed.mode', kind: 'string' },
  GATEWAY_TERMINAL_BUFFER_SIZE: { path: 'terminalFeed.bufferSize', kind: 'number' },
  GATEWAY_TERMINAL_QUEUE_SIZE: { path: 'terminalFeed.subscriberQueueSize', kind: 'number' },
  GATEWAY_TERMINAL_MAX_LINE_CHARS: { path: 'terminalFeed.maxLineChars', kind: 'number' },
  GATEWAY_TERMINAL_DEFAULT_LEVEL: { path: 'terminalFeed.defaultLevel', kind: 'string' },
  GATEWAY_TERMINAL_BACKLOG_LINES: { path: 'terminalFeed.backlogLines', kind: 'number' },
  GATEWAY_TERMINAL_KEEPALIVE_SECONDS: { path: 'terminalFeed.keepaliveSeconds', kind: 'number' },
  GATEWAY_TERMINAL_INSTANCE_ID: { path: 'terminalFeed.instanceId', kind: 'string' },
  GATEWAY_TERMINAL_REDACT_PATTERNS: { path: 'terminalFeed.redactExtraPatterns', kind: 'string' },
  GATEWAY_TERMINAL_BUS_MODE: { path: 'terminalFeed.busMode', kind: 'string' },
  GATEWAY_TERMINAL_REDIS_URL: { path: 'terminalFeed.redisUrl', kind: 'string' },
  GATEWAY_TERMINAL_REDIS_CHANNEL: { path: 'terminalFeed.redisChannel', kind: 'string' },
  GATEWAY_TERMINAL_REDIS_CONNECT_TIMEOUT_MS: {
    path: 'terminalFeed.redisConnectTimeoutMs',
    kind: 'number',
  },
};

/**
 * Parse environment variable value to the type its mapping declares.
 * Values that do not parse are passed through as strings so the schema
 * reports them against the right path.
 */
export function parseEnvValue(value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'number': {
      const trimmed = value.trim();
      return /^-?\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : value;
    }
    case 'boolean': {
      const lowered = value.trim().toLowerCase();
      if (lowered === 'true' || lowered === '1' || lowered === 'yes') {
        return true;
      }
      if (lowered === 'false' || lowered === '0' || lowered === 'no') {
        return false;
      }
      return value;
    }
    case 'list': {
      const items = value.split(',').map(s => s.trim());
      return items.every(item => /^-?\d+$/.test(item)) ? items.map(Number) : items;
    }
    default:
      return value;
  }
}

/**
 * Set nested value in object using dot notation path
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[keys[keys.length - 1]] = value;
}

/**
 * Apply every mapped environment variable onto a raw config object
 */
export function applyEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const applied: string[] = [];
  for (const [envVar, mapping] of Object.entries(ENV_CONFIG_MAPPING)) {
    const raw = env[envVar];
    if (raw === undefined) {
      continue;
    }
    setNestedValue(target, mapping.path, parseEnvValue(raw, mapping.kind));
    applied.push(envVar);
  }
  if (applied.length > 0) {
    logger.debug(`Applied environment overrides: ${applied.join(', ')}`);
  }
  return applied;
}
