/**
 * terminal-feed.ts
 * Live operator log feed: a bounded history of redacted lines plus
 * non-blocking fanout to per-connection subscriber queues.
 *
 * Every publish goes through one inbox drained by a single consumer, so the
 * buffer and the subscriber set are only ever mutated from one place, even
 * when a subscriber or the distributor publishes while a drain is running.
 */

import { addLogSink, formatLogLine, type LogEntry, type LogLevelName } from '../utils/logger.js';
import { isPlainObject } from '../utils/json-utils.js';
import type { LogRedactor } from './log-redactor.js';
import { RingBuffer } from './ring-buffer.js';
import { SubscriberQueue } from './subscriber-queue.js';

export const LEVEL_RANK = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
} as const;

export type TerminalLevel = keyof typeof LEVEL_RANK;

export interface TerminalEvent {
  ts: string;
  source: string;
  level: TerminalLevel;
  message: string;
  instance: string;
}

export interface TerminalFeedStats {
  buffer_size: number;
  subscriber_count: number;
  dropped_events: number;
  distributed_publish_failures: number;
}

export type TerminalSubscriber = SubscriberQueue<TerminalEvent>;

/**
 * Hands a locally produced event to sibling replicas
 */
export type Distributor = (event: TerminalEvent) => Promise<void>;

export const MIN_BUFFER_SIZE = 10;
export const MIN_QUEUE_SIZE = 10;
export const MIN_LINE_CHARS = 256;
const MAX_SOURCE_CHARS = 120;
const MAX_TS_CHARS = 64;
const TRUNCATION_SUFFIX = '...[truncated]';

export function isTerminalLevel(value: string): value is TerminalLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Upper-cased level, or `fallback` when unknown
 */
export function validateLevel(raw: string | undefined, fallback: TerminalLevel = 'INFO'): TerminalLevel {
  const candidate = (raw || fallback).trim().toUpperCase();
  return isTerminalLevel(candidate) ? candidate : 'INFO';
}

/**
 * Comma-separated source names; undefined means "all sources"
 */
export function parseSourceFilter(raw: string | undefined): Set<string> | undefined {
  if (!raw) {
    return undefined;
  }
  const values = new Set(
    raw
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );
  return values.size > 0 ? values : undefined;
}

export function eventMatchesFilters(
  event: TerminalEvent,
  minLevel: TerminalLevel,
  sources: Set<string> | undefined
): boolean {
  if (sources && !sources.has(event.source)) {
    return false;
  }
  return LEVEL_RANK[event.level] >= LEVEL_RANK[minLevel];
}

/**
 * One Server-Sent Events frame with a compact JSON payload
 */
export function asSse(eventName: string, payload: unknown): string {
  return `event: ${eventName}\ndata: ${JSON.stringify(payload)}\n\n`;
}

function toTerminalLevel(level: LogLevelName): TerminalLevel {
  switch (level) {
    case 'debug':
      return 'DEBUG';
    case 'warn':
      return 'WARNING';
    case 'error':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

export interface TerminalFeedOptions {
  bufferSize: number;
  subscriberQueueSize: number;
  maxLineChars: number;
  instanceId: string;
  redactor: LogRedactor;
  now?: () => Date;
}

interface InboxItem {
  event: TerminalEvent;
  distribute: boolean;
}

export class TerminalFeed {
  readonly instanceId: string;
  private readonly buffer: RingBuffer<TerminalEvent>;
  private readonly subscribers = new Set<TerminalSubscriber>();
  private readonly subscriberQueueSize: number;
  private readonly maxLineChars: number;
  private readonly redactor: LogRedactor;
  private readonly now: () => Date;
  private readonly inbox: InboxItem[] = [];
  private readonly pendingDistributions = new Set<Promise<void>>();
  private draining = false;
  private distributor: Distributor | undefined;
  private detachSink: (() => void) | undefined;
  private droppedEvents = 0;
  private distributedPublishFailures = 0;

  constructor(options: TerminalFeedOptions) {
    this.buffer = new RingBuffer(Math.max(MIN_BUFFER_SIZE, options.bufferSize));
    this.subscriberQueueSize = Math.max(MIN_QUEUE_SIZE, options.subscriberQueueSize);
    this.maxLineChars = Math.max(MIN_LINE_CHARS, options.maxLineChars);
    this.instanceId = options.instanceId;
    this.redactor = options.redactor;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Publish a locally produced line. Never blocks and never throws.
   */
  publish(source: string, level: string, message: unknown): TerminalEvent {
    const event: TerminalEvent = {
      ts: this.now().toISOString(),
      source: (source || 'gateway').trim().slice(0, MAX_SOURCE_CHARS),
      level: validateLevel(level),
      message: this.sanitize(message),
      instance: this.instanceId,
    };
    this.enqueue(event, true);
    return event;
  }

  /**
   * Accept an event relayed from another replica. Events carrying this
   * instance's id and non-object payloads are ignored. Relayed events are
   * not distributed again.
   */
  ingestExternalEvent(raw: unknown): TerminalEvent | undefined {
    if (!isPlainObject(raw)) {
      return undefined;
    }
    const instance = String(raw.instance ?? 'external').trim().slice(0, MAX_SOURCE_CHARS);
    if (instance === this.instanceId) {
      return undefined;
    }
    const level = String(raw.level ?? 'INFO').toUpperCase();
    const ts = String(raw.ts ?? '').trim().slice(0, MAX_TS_CHARS);
    const event: TerminalEvent = {
      ts: ts || this.now().toISOString(),
      source: String(raw.source ?? 'external').trim().slice(0, MAX_SOURCE_CHARS),
      level: isTerminalLevel(level) ? level : 'INFO',
      message: this.sanitize(raw.message ?? ''),
      instance,
    };
    this.enqueue(event, false);
    return event;
  }

  subscribe(): TerminalSubscriber {
    const queue = new SubscriberQueue<TerminalEvent>(this.subscriberQueueSize);
    this.subscribers.add(queue);
    return queue;
  }

  unsubscribe(queue: TerminalSubscriber): void {
    this.subscribers.delete(queue);
    queue.close();
  }

  setDistributor(distributor: Distributor | undefined): void {
    this.distributor = distributor;
  }

  /**
   * Up to `limit` buffered events at or above `minLevel` (and from `sources`
   * when given), most recent ones, returned oldest first.
   */
  backlog(limit: number, minLevel: TerminalLevel = 'INFO', sources?: Set<string>): TerminalEvent[] {
    const bounded = Math.max(1, Math.min(limit, this.buffer.size));
    const items: TerminalEvent[] = [];
    for (const event of this.buffer.newestFirst()) {
      if (!eventMatchesFilters(event, minLevel, sources)) {
        continue;
      }
      items.push(event);
      if (items.length >= bounded) {
        break;
      }
    }
    return items.reverse();
  }

  stats(): TerminalFeedStats {
    return {
      buffer_size: this.buffer.size,
      subscriber_count: this.subscribers.size,
      dropped_events: this.droppedEvents,
      distributed_publish_failures: this.distributedPublishFailures,
    };
  }

  /**
   * Forward every logger entry at INFO or above into the feed
   */
  attachToLogger(): void {
    if (this.detachSink) {
      return;
    }
    this.detachSink = addLogSink((entry: LogEntry) => {
      if (entry.level === 'debug') {
        return;
      }
      this.publish(entry.source, toTerminalLevel(entry.level), formatLogLine(entry));
    });
  }

  detachFromLogger(): void {
    this.detachSink?.();
    this.detachSink = undefined;
  }

  /**
   * Resolves once every distributor call started so far has settled
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingDistributions]);
  }

  stop(): void {
    this.detachFromLogger();
    this.distributor = undefined;
    for (const queue of this.subscribers) {
      queue.close();
    }
    this.subscribers.clear();
  }

  private sanitize(message: unknown): string {
    const singleLine = String(message).replace(/\r/g, ' ').replace(/\n/g, ' \\n ');
    const text = this.redactor.redact(singleLine);
    if (text.length > this.maxLineChars) {
      return `${text.slice(0, this.maxLineChars - TRUNCATION_SUFFIX.length)}${TRUNCATION_SUFFIX}`;
    }
    return text;
  }

  private enqueue(event: TerminalEvent, distribute: boolean): void {
    this.inbox.push({ event, distribute });
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let item = this.inbox.shift();
      while (item) {
        this.deliver(item.event, item.distribute);
        item = this.inbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private deliver(event: TerminalEvent, distribute: boolean): void {
    this.buffer.push(event);

    const stale: TerminalSubscriber[] = [];
    for (const queue of this.subscribers) {
      if (queue.isFull() && queue.dropOldest()) {
        this.droppedEvents++;
      }
      if (!queue.offer(event)) {
        this.droppedEvents++;
        stale.push(queue);
      }
    }
    for (const queue of stale) {
      this.subscribers.delete(queue);
      queue.close();
    }

    const distributor = this.distributor;
    if (distribute && distributor) {
      const task: Promise<void> = Promise.resolve()
        .then(() => distributor(event))
        .catch(() => {
          this.distributedPublishFailures++;
        })
        .finally(() => {
          this.pendingDistributions.delete(task);
        });
      this.pendingDistributions.add(task);
    }
  }
}
