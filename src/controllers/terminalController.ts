/**
 * terminalController.ts
 * Server-Sent Events stream of the terminal feed
 */

import type { Request, Response } from 'express';
import { ERROR_MESSAGES, TERMINAL_BACKLOG_MAX, TERMINAL_BACKLOG_MIN } from '../constants/index.js';
import type { GatewayContext } from '../gateway-context.js';
import { waitForDrain } from '../streaming.js';
import {
  asSse,
  eventMatchesFilters,
  parseSourceFilter,
  validateLevel,
} from '../terminal-feed/terminal-feed.js';

const MIN_KEEPALIVE_SECONDS = 5;

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function clampBacklog(raw: string | undefined, fallback: number): number {
  const parsed = raw === undefined ? NaN : Number.parseInt(raw, 10);
  const requested = Number.isNaN(parsed) ? fallback : parsed;
  return Math.max(TERMINAL_BACKLOG_MIN, Math.min(requested, TERMINAL_BACKLOG_MAX));
}

/**
 * Write one frame, then wait out a full socket buffer so that a slow client
 * backs up into its bounded subscriber queue instead of into memory.
 */
async function writeFrame(res: Response, frame: string): Promise<void> {
  if (res.writableEnded || res.destroyed) {
    return;
  }
  if (!res.write(frame) && !res.destroyed) {
    await waitForDrain(res);
  }
}

/**
 * GET /events/terminal
 */
export function streamTerminalEvents(context: GatewayContext) {
  return async (req: Request, res: Response): Promise<void> => {
    const feedConfig = context.config.terminalFeed;
    if (feedConfig.mode !== 'live') {
      res.status(404).json({ error: ERROR_MESSAGES.TERMINAL_FEED_DISABLED });
      return;
    }

    const feed = context.terminalFeed;
    const sources = parseSourceFilter(queryValue(req.query.sources));
    const minLevel = validateLevel(queryValue(req.query.level), feedConfig.defaultLevel);
    const backlog = clampBacklog(queryValue(req.query.backlog), feedConfig.backlogLines);
    const keepaliveMs = Math.max(MIN_KEEPALIVE_SECONDS, feedConfig.keepaliveSeconds) * 1000;

    const subscriber = feed.subscribe();
    let connected = true;
    res.on('close', () => {
      connected = false;
      feed.unsubscribe(subscriber);
    });

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    try {
      await writeFrame(
        res,
        asSse('meta', { instance: context.instanceId, mode: feedConfig.mode, bus_mode: context.busMode })
      );
      for (const event of feed.backlog(backlog, minLevel, sources)) {
        await writeFrame(res, asSse('log', event));
      }

      while (connected) {
        const event = await subscriber.next(keepaliveMs);
        if (!connected) {
          break;
        }
        if (event === null) {
          if (subscriber.isClosed) {
            break;
          }
          await writeFrame(res, ': keepalive\n\n');
          continue;
        }
        if (eventMatchesFilters(event, minLevel, sources)) {
          await writeFrame(res, asSse('log', event));
        }
      }
    } finally {
      feed.unsubscribe(subscriber);
      if (!res.writableEnded) {
        res.end();
      }
    }
  };
}

/**
 * GET /events/terminal/stats
 */
export function getTerminalStats(context: GatewayContext) {
  return (_req: Request, res: Response): void => {
    res.json({
      instance: context.instanceId,
      mode: context.config.terminalFeed.mode,
      bus_mode: context.busMode,
      bus_connected: context.terminalBus?.connected ?? false,
      ...context.terminalFeed.stats(),
    });
  };
}
