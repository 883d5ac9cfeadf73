/**
 * redis-bus.test.ts
 * Tests for the cross-replica terminal bus against an in-memory pub/sub
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LogRedactor } from '../../src/terminal-feed/log-redactor.js';
import { TerminalBus, type PubSubConnection } from '../../src/terminal-feed/redis-bus.js';
import { TerminalFeed } from '../../src/terminal-feed/terminal-feed.js';

vi.mock('../../src/utils/logger.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
  return {
    ...actual,
    createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  };
});

/**
 * One shared channel map standing in for the broker
 */
class FakeBroker {
  private listeners = new Map<string, Set<(message: string) => void>>();
  published: Array<{ channel: string; message: string }> = [];
  failConnects = 0;
  connects = 0;
  live: FakeConnection[] = [];

  async connect(): Promise<PubSubConnection> {
    this.connects++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new Error('ECONNREFUSED');
    }
    const connection = new FakeConnection(this);
    this.live.push(connection);
    return connection;
  }

  publish(channel: string, message: string): void {
    this.published.push({ channel, message });
    for (const listener of this.listeners.get(channel) ?? []) {
      listener(message);
    }
  }

  subscribe(channel: string, listener: (message: string) => void): () => void {
    let set = this.listeners.get(channel);
    if (!set) {
      set = new Set();
      this.listeners.set(channel, set);
    }
    set.add(listener);
    return () => set?.delete(listener);
  }
}

class FakeConnection implements PubSubConnection {
  readonly lost: Promise<Error>;
  closed = false;
  private markLost: (error: Error) => void = () => undefined;
  private unsubscribers: Array<() => void> = [];

  constructor(private readonly broker: FakeBroker) {
    this.lost = new Promise(resolve => {
      this.markLost = resolve;
    });
  }

  async publish(channel: string, message: string): Promise<void> {
    this.broker.publish(channel, message);
  }

  async subscribe(channel: string, listener: (message: string) => void): Promise<void> {
    this.unsubscribers.push(this.broker.subscribe(channel, listener));
  }

  drop(): void {
    this.markLost(new Error('connection reset'));
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
  }
}

async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}

function buildFeed(instanceId: string): TerminalFeed {
  return new TerminalFeed({
    bufferSize: 50,
    subscriberQueueSize: 10,
    maxLineChars: 1000,
    instanceId,
    redactor: new LogRedactor(),
  });
}

describe('TerminalBus', () => {
  let broker: FakeBroker;
  const buses: TerminalBus[] = [];

  function attach(feed: TerminalFeed, backoff = 10): TerminalBus {
    const bus = new TerminalBus({
      feed,
      connect: () => broker.connect(),
      channel: 'gateway:terminal_feed',
      instanceId: feed.instanceId,
      initialBackoffMs: backoff,
      maxBackoffMs: backoff * 4,
    });
    feed.setDistributor(bus.publishEvent);
    buses.push(bus);
    bus.start();
    return bus;
  }

  beforeEach(() => {
    broker = new FakeBroker();
  });

  afterEach(async () => {
    await Promise.all(buses.splice(0).map(bus => bus.stop()));
  });

  it('should relay events between replicas without echoing them back', async () => {
    const feedA = buildFeed('gw-a');
    const feedB = buildFeed('gw-b');
    const busA = attach(feedA);
    const busB = attach(feedB);
    await waitFor(() => busA.connected && busB.connected);

    feedA.publish('llm', 'INFO', 'from a');
    await feedA.flush();

    expect(feedB.backlog(10).map(event => [event.instance, event.message])).toEqual([['gw-a', 'from a']]);
    expect(feedA.backlog(10)).toHaveLength(1);
    // the relayed copy is not published again by b
    expect(broker.published).toHaveLength(1);
  });

  it('should ignore malformed messages and its own events', async () => {
    const feed = buildFeed('gw-a');
    const bus = attach(feed);
    await waitFor(() => bus.connected);

    bus.handleMessage('not json');
    bus.handleMessage('[1,2]');
    bus.handleMessage(JSON.stringify({ instance: 'gw-a', message: 'echo' }));
    expect(feed.stats().buffer_size).toBe(0);

    bus.handleMessage(JSON.stringify({ instance: 'gw-c', source: 'stt', level: 'ERROR', message: 'remote' }));
    expect(feed.backlog(10, 'DEBUG').map(event => event.message)).toEqual(['remote']);
  });

  it('should skip publishing while disconnected', async () => {
    broker.failConnects = 1000;
    const feed = buildFeed('gw-a');
    attach(feed);
    feed.publish('llm', 'INFO', 'offline');
    await feed.flush();
    expect(broker.published).toEqual([]);
    expect(feed.stats().distributed_publish_failures).toBe(0);
  });

  it('should keep retrying until the broker accepts the connection', async () => {
    broker.failConnects = 2;
    const bus = attach(buildFeed('gw-a'));
    await waitFor(() => bus.connected);
    expect(broker.connects).toBe(3);
  });

  it('should reconnect after the connection is lost', async () => {
    const bus = attach(buildFeed('gw-a'));
    await waitFor(() => bus.connected);
    const first = broker.live[0];

    first.drop();
    await waitFor(() => broker.live.length === 2 && bus.connected);
    expect(first.closed).toBe(true);
  });

  it('should close the connection on stop', async () => {
    const bus = attach(buildFeed('gw-a'));
    await waitFor(() => bus.connected);
    await bus.stop();
    expect(bus.connected).toBe(false);
    expect(broker.live[0].closed).toBe(true);
  });
});
