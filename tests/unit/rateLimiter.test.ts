/**
 * rateLimiter.test.ts
 * Tests for rate limiting middleware
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import express from 'express';
import { createRateLimiter } from '../../src/middleware/rateLimiter.js';
import { startTestServer, type TestServer } from '../utils/test-helpers.js';

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() }),
}));

describe('rateLimiter middleware', () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  async function serve(maxRequests: number, windowMs = 60000): Promise<string> {
    const app = express();
    app.get('/limited', createRateLimiter({ windowMs, maxRequests }), (_req, res) => {
      res.json({ ok: true });
    });
    server = await startTestServer(app);
    return `${server.url}/limited`;
  }

  it('should allow requests under the limit with standard headers', async () => {
    const url = await serve(3);
    const response = await fetch(url);
    expect(response.status).toBe(200);
    expect(response.headers.get('ratelimit-limit')).toBe('3');
    expect(response.headers.get('ratelimit-remaining')).toBe('2');
    expect(response.headers.get('x-ratelimit-limit')).toBeNull();
  });

  it('should answer 429 once the limit is exceeded', async () => {
    const url = await serve(1, 30000);
    expect((await fetch(url)).status).toBe(200);

    const limited = await fetch(url);
    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({
      error: 'Too many requests, please try again later',
      retryAfter: 30,
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toEqual({ path: '/limited', method: 'GET' });
  });

  it('should keep separate counters per limiter', async () => {
    const first = createRateLimiter({ windowMs: 60000, maxRequests: 1 });
    const second = createRateLimiter({ windowMs: 60000, maxRequests: 1 });
    const app = express();
    app.get('/a', first, (_req, res) => {
      res.json({ route: 'a' });
    });
    app.get('/b', second, (_req, res) => {
      res.json({ route: 'b' });
    });
    server = await startTestServer(app);

    expect((await fetch(`${server.url}/a`)).status).toBe(200);
    expect((await fetch(`${server.url}/b`)).status).toBe(200);
    expect((await fetch(`${server.url}/a`)).status).toBe(429);
  });
});
