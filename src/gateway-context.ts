/**
 * gateway-context.ts
 * Builds the components the HTTP layer depends on and owns their lifecycle
 */

import os from 'os';
import { BackendClient } from './backend-client.js';
import { CircuitBreakerRegistry } from './circuit-breaker.js';
import type { BackendRegistry } from './config/backend-registry.js';
import { ConfigValidationError } from './config/config.js';
import type { GatewayConfig, TerminalFeedConfig } from './config/schema.js';
import { ModelOrchestrator } from './model-orchestrator.js';
import { ModelProfileStore } from './model-profile-store.js';
import { LogRedactor } from './terminal-feed/log-redactor.js';
import { connectRedis, TerminalBus, type PubSubConnector } from './terminal-feed/redis-bus.js';
import { TerminalFeed } from './terminal-feed/terminal-feed.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('gateway');

export type BusMode = 'local' | 'redis';

export interface GatewayContext {
  config: GatewayConfig;
  registry: BackendRegistry;
  breakers: CircuitBreakerRegistry;
  client: BackendClient;
  profiles: ModelProfileStore;
  orchestrator: ModelOrchestrator;
  terminalFeed: TerminalFeed;
  terminalBus: TerminalBus | undefined;
  instanceId: string;
  busMode: BusMode;
}

export interface CreateContextOptions {
  config: GatewayConfig;
  registry: BackendRegistry;
  /** Replaces the redis connector */
  pubSubConnector?: PubSubConnector;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Bus mode for the feed. Redis without a URL is a configuration error; an
 * unknown mode falls back to local.
 */
export function resolveBusMode(config: TerminalFeedConfig): BusMode {
  if (config.mode !== 'live') {
    return 'local';
  }
  const mode = config.busMode.trim().toLowerCase();
  if (mode === 'redis') {
    if (!config.redisUrl?.trim()) {
      throw new ConfigValidationError([
        { path: 'terminalFeed.redisUrl', message: 'Required when terminalFeed.busMode is redis' },
      ]);
    }
    return 'redis';
  }
  if (mode !== '' && mode !== 'local') {
    log.warn(`Unknown terminal feed bus mode '${mode}'; falling back to local-only mode`);
  }
  return 'local';
}

export function createGatewayContext(options: CreateContextOptions): GatewayContext {
  const { config, registry } = options;
  const feedConfig = config.terminalFeed;
  const instanceId = feedConfig.instanceId ?? os.hostname();

  const breakers = new CircuitBreakerRegistry(config.circuitBreaker, options.now);
  const client = new BackendClient({
    timeouts: config.timeouts,
    pool: config.pool,
    maxRetries: config.retry.maxRetries,
    retryDelaysMs: config.retry.delaysMs,
    breakers,
    sleep: options.sleep,
  });
  const profiles = new ModelProfileStore(config.profiles.path);
  const orchestrator = new ModelOrchestrator({
    client,
    registry,
    backend: config.routing.llm,
    config: config.models,
    profiles,
    sleep: options.sleep,
    now: options.now,
  });

  const redactor = new LogRedactor(feedConfig.redactExtraPatterns);
  for (const pattern of redactor.invalidPatterns) {
    log.warn(`Ignoring invalid redaction pattern: ${pattern}`);
  }
  const terminalFeed = new TerminalFeed({
    bufferSize: feedConfig.bufferSize,
    subscriberQueueSize: feedConfig.subscriberQueueSize,
    maxLineChars: feedConfig.maxLineChars,
    instanceId,
    redactor,
  });

  const busMode = resolveBusMode(feedConfig);
  let terminalBus: TerminalBus | undefined;
  if (busMode === 'redis') {
    const redisUrl = feedConfig.redisUrl ?? '';
    terminalBus = new TerminalBus({
      feed: terminalFeed,
      channel: feedConfig.redisChannel,
      instanceId,
      connect:
        options.pubSubConnector ?? (() => connectRedis(redisUrl, feedConfig.redisConnectTimeoutMs)),
    });
    terminalFeed.setDistributor(terminalBus.publishEvent);
  }

  return {
    config,
    registry,
    breakers,
    client,
    profiles,
    orchestrator,
    terminalFeed,
    terminalBus,
    instanceId,
    busMode,
  };
}

export function startGatewayContext(context: GatewayContext): void {
  if (context.config.terminalFeed.mode === 'live') {
    context.terminalFeed.attachToLogger();
  }
  if (context.terminalBus) {
    context.terminalBus.start();
    log.info(`Terminal feed bus enabled: redis channel=${context.config.terminalFeed.redisChannel}`);
  }
}

export async function stopGatewayContext(context: GatewayContext): Promise<void> {
  if (context.terminalBus) {
    await context.terminalBus.stop();
  }
  context.terminalFeed.setDistributor(undefined);
  await context.terminalFeed.flush();
  context.terminalFeed.stop();
  await context.client.close();
}
