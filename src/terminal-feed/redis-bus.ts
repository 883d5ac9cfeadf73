/**
 * redis-bus.ts
 * Relays terminal feed events between gateway replicas over a pub/sub channel
 */

import { createClient } from 'redis';
import { getErrorMessage } from '../utils/error-helpers.js';
import { isPlainObject, safeJsonParse } from '../utils/json-utils.js';
import { createLogger } from '../utils/logger.js';
import type { TerminalEvent, TerminalFeed } from './terminal-feed.js';

const log = createLogger('terminal-bus');

/**
 * The slice of a pub/sub client the bus needs
 */
export interface PubSubConnection {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, listener: (message: string) => void): Promise<void>;
  /** Resolves with the cause once the connection is lost */
  readonly lost: Promise<Error>;
  close(): Promise<void>;
}

export type PubSubConnector = () => Promise<PubSubConnection>;

/**
 * Publisher plus a duplicated subscriber connection. Reconnection is left to
 * the bus, so the client's own retry is disabled.
 */
export async function connectRedis(url: string, connectTimeoutMs: number): Promise<PubSubConnection> {
  const publisher = createClient({
    url,
    socket: { connectTimeout: connectTimeoutMs, reconnectStrategy: false },
  });
  const subscriber = publisher.duplicate();

  let markLost: (cause: Error) => void = () => undefined;
  const lost = new Promise<Error>(resolve => {
    markLost = resolve;
  });
  for (const client of [publisher, subscriber]) {
    client.on('error', (error: unknown) => {
      markLost(error instanceof Error ? error : new Error(String(error)));
    });
    client.on('end', () => markLost(new Error('Redis connection closed')));
  }

  const closeAll = async (): Promise<void> => {
    await Promise.allSettled(
      [subscriber, publisher].filter(client => client.isOpen).map(client => client.disconnect())
    );
  };

  try {
    await publisher.connect();
    await subscriber.connect();
    await publisher.ping();
  } catch (error) {
    await closeAll();
    throw error;
  }

  return {
    lost,
    publish: async (channel, message) => {
      await publisher.publish(channel, message);
    },
    subscribe: async (channel, listener) => {
      await subscriber.subscribe(channel, message => listener(message));
    },
    close: closeAll,
  };
}

export interface TerminalBusOptions {
  feed: TerminalFeed;
  connect: PubSubConnector;
  channel: string;
  instanceId: string;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
}

export const INITIAL_BACKOFF_MS = 1000;
export const MAX_BACKOFF_MS = 15000;

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}

export class TerminalBus {
  private connection: PubSubConnection | undefined;
  private controller: AbortController | undefined;
  private loop: Promise<void> | undefined;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;

  constructor(private readonly options: TerminalBusOptions) {
    this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
  }

  get connected(): boolean {
    return this.connection !== undefined;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
  }

  /**
   * Distributor for the feed. A no-op while disconnected.
   */
  publishEvent = async (event: TerminalEvent): Promise<void> => {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    await connection.publish(this.options.channel, JSON.stringify(event));
  };

  /**
   * Handle one raw channel message. Malformed payloads and this instance's
   * own events are ignored.
   */
  handleMessage(data: string): void {
    const event = safeJsonParse(data);
    if (!isPlainObject(event)) {
      return;
    }
    if (String(event.instance ?? '') === this.options.instanceId) {
      return;
    }
    this.options.feed.ingestExternalEvent(event);
  }

  private async run(signal: AbortSignal): Promise<void> {
    let backoff = this.initialBackoffMs;
    const stopped = waitForAbort(signal);

    while (!signal.aborted) {
      let connection: PubSubConnection | undefined;
      try {
        connection = await this.options.connect();
        await connection.subscribe(this.options.channel, message => this.handleMessage(message));
        this.connection = connection;
        log.info(`Terminal bus connected on channel=${this.options.channel}`);
        backoff = this.initialBackoffMs;
        const cause = await Promise.race([connection.lost, stopped]);
        if (cause) {
          throw cause;
        }
      } catch (error) {
        this.connection = undefined;
        if (signal.aborted) {
          break;
        }
        log.warn(`Terminal bus unavailable: ${getErrorMessage(error)}`);
        await delay(backoff, signal);
        backoff = Math.min(backoff * 2, this.maxBackoffMs);
      } finally {
        this.connection = undefined;
        if (connection) {
          await connection.close().catch((error: unknown) => {
            log.debug(`Terminal bus close failed: ${getErrorMessage(error)}`);
          });
        }
      }
    }
  }
}
