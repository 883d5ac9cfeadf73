/**
 * backend-client.test.ts
 * Tests for pooled dispatch, retry and breaker gating against in-process backends
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import express from 'express';
import { BackendClient, isConnectError, isReadTimeoutError } from '../../src/backend-client.js';
import { CircuitBreakerRegistry } from '../../src/circuit-breaker.js';
import { BackendTimeoutError, BackendUnavailableError } from '../../src/utils/errors.js';
import { closedPortUrl, startTestServer, testConfig, type TestServer } from '../utils/test-helpers.js';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

function buildClient(sleeps: number[] = [], threshold = 5) {
  const config = testConfig({ timeouts: { llm: 200, default: 1000 } });
  const breakers = new CircuitBreakerRegistry({ threshold, cooldownMs: 60000 });
  const client = new BackendClient({
    timeouts: config.timeouts,
    pool: config.pool,
    maxRetries: 3,
    retryDelaysMs: [500, 1000],
    breakers,
    sleep: async ms => {
      sleeps.push(ms);
    },
  });
  return { client, breakers };
}

describe('BackendClient', () => {
  let backend: TestServer;
  let hits: Record<string, number>;
  const clients: BackendClient[] = [];

  const track = (built: ReturnType<typeof buildClient>) => {
    clients.push(built.client);
    return built;
  };

  beforeAll(async () => {
    hits = {};
    const app = express();
    app.use(express.json());
    app.use((req, _res, next) => {
      hits[req.path] = (hits[req.path] ?? 0) + 1;
      next();
    });
    app.get('/health', (_req, res) => {
      res.json({ status: 'ok' });
    });
    app.get('/sick', (_req, res) => {
      res.status(503).send('warming up');
    });
    app.post('/echo', (req, res) => {
      res.json({ received: req.body, contentType: req.headers['content-type'] });
    });
    app.get('/boom', (_req, res) => {
      res.status(500).json({ error: 'exploded' });
    });
    app.get('/slow', (_req, res) => {
      setTimeout(() => {
        if (!res.destroyed) {
          res.json({ late: true });
        }
      }, 3000);
    });
    app.get('/stream', (_req, res) => {
      res.setHeader('Content-Type', 'text/event-stream');
      res.write('data: one\n\n');
      res.write('data: two\n\n');
      res.end();
    });
    backend = await startTestServer(app);
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map(client => client.close()));
  });

  afterAll(async () => {
    await backend.close();
  });

  describe('timeoutFor', () => {
    it('should fall back to the default class for unknown names', () => {
      const { client } = track(buildClient());
      expect(client.timeoutFor('llm')).toBe(200);
      expect(client.timeoutFor('video')).toBe(1000);
    });
  });

  describe('request', () => {
    it('should send JSON and buffer the response', async () => {
      const { client, breakers } = track(buildClient());
      const response = await client.request('llm', 'POST', `${backend.url}/echo`, { json: { a: 1 } });

      expect(response.status).toBe(200);
      expect(response.ok).toBe(true);
      expect(response.contentType).toContain('application/json');
      expect(response.json()).toEqual({ received: { a: 1 }, contentType: 'application/json' });
      expect(breakers.get('llm')?.getState()).toBe('closed');
    });

    it('should return HTTP error statuses without retrying', async () => {
      const { client, breakers } = track(buildClient());
      const before = hits['/boom'] ?? 0;
      const response = await client.request('llm', 'GET', `${backend.url}/boom`);

      expect(response.status).toBe(500);
      expect(response.ok).toBe(false);
      expect(hits['/boom']).toBe(before + 1);
      expect(breakers.get('llm')?.getStats().failureCount).toBe(0);
    });

    it('should retry connect failures with backoff and then give up', async () => {
      const sleeps: number[] = [];
      const { client, breakers } = track(buildClient(sleeps));
      const url = await closedPortUrl();

      const error = await client.request('llm', 'GET', `${url}/models`).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendUnavailableError);
      expect(error).toMatchObject({ statusCode: 503, backend: 'llm' });
      expect(sleeps).toEqual([500, 1000]);
      expect(breakers.get('llm')?.getStats().failureCount).toBe(3);
    });

    it('should repeat the last delay when retries outnumber delays', async () => {
      const sleeps: number[] = [];
      const { client } = track(buildClient(sleeps, 10));
      const url = await closedPortUrl();

      await expect(client.request('llm', 'GET', url, { maxRetries: 4 })).rejects.toBeInstanceOf(
        BackendUnavailableError
      );
      expect(sleeps).toEqual([500, 1000, 1000]);
    });

    it('should fail fast without network I/O while the breaker is open', async () => {
      const sleeps: number[] = [];
      const { client, breakers } = track(buildClient(sleeps, 2));
      breakers.getOrCreate('llm').recordFailure();
      breakers.getOrCreate('llm').recordFailure();
      const before = hits['/health'] ?? 0;

      await expect(client.request('llm', 'GET', `${backend.url}/health`)).rejects.toThrow(
        "Circuit breaker open for backend 'llm'"
      );
      expect(hits['/health'] ?? 0).toBe(before);
      expect(sleeps).toEqual([]);
    });

    it('should stop retrying once the breaker opens mid-sequence', async () => {
      const sleeps: number[] = [];
      const { client, breakers } = track(buildClient(sleeps, 2));
      const url = await closedPortUrl();

      await expect(client.request('llm', 'GET', url)).rejects.toThrow(
        "Circuit breaker open for backend 'llm'"
      );
      expect(sleeps).toEqual([500, 1000]);
      expect(breakers.get('llm')?.getState()).toBe('open');
    });

    it('should map a slow backend to a timeout without retrying', async () => {
      const { client, breakers } = track(buildClient());
      const before = hits['/slow'] ?? 0;

      const error = await client
        .request('llm', 'GET', `${backend.url}/slow`, { timeoutClass: 'llm' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendTimeoutError);
      expect(error).toMatchObject({ statusCode: 504 });
      expect(hits['/slow']).toBe(before + 1);
      expect(breakers.get('llm')?.getStats().failureCount).toBe(0);
    });
  });

  describe('stream', () => {
    it('should yield the upstream chunks', async () => {
      const { client } = track(buildClient());
      const upstream = await client.stream('llm', 'GET', `${backend.url}/stream`);
      expect(upstream.status).toBe(200);
      expect(upstream.contentType).toContain('text/event-stream');

      const received: string[] = [];
      for await (const chunk of upstream.chunks()) {
        received.push(chunk.toString('utf-8'));
      }
      expect(received.join('')).toBe('data: one\n\ndata: two\n\n');
    });

    it('should not retry connect failures', async () => {
      const sleeps: number[] = [];
      const { client, breakers } = track(buildClient(sleeps));
      const url = await closedPortUrl();

      await expect(client.stream('llm', 'GET', url)).rejects.toBeInstanceOf(BackendUnavailableError);
      expect(sleeps).toEqual([]);
      expect(breakers.get('llm')?.getStats().failureCount).toBe(1);
    });

    it('should buffer an error response with readAll', async () => {
      const { client } = track(buildClient());
      const upstream = await client.stream('llm', 'GET', `${backend.url}/boom`);
      const response = await upstream.readAll();
      expect(response.status).toBe(500);
      expect(response.json()).toEqual({ error: 'exploded' });
    });
  });

  describe('healthCheck', () => {
    it('should report healthy for a 200', async () => {
      const { client } = track(buildClient());
      expect(await client.healthCheck('llm', `${backend.url}/health`)).toEqual({
        status: 'healthy',
        code: 200,
      });
    });

    it('should report unhealthy with the status code otherwise', async () => {
      const { client } = track(buildClient());
      expect(await client.healthCheck('llm', `${backend.url}/sick`)).toEqual({
        status: 'unhealthy',
        code: 503,
      });
    });

    it('should report unreachable instead of throwing', async () => {
      const { client } = track(buildClient());
      const result = await client.healthCheck('llm', `${await closedPortUrl()}/health`);
      expect(result.status).toBe('unreachable');
      expect(result).toHaveProperty('error');
    });

    it('should bypass an open breaker', async () => {
      const { client, breakers } = track(buildClient([], 1));
      breakers.getOrCreate('llm').recordFailure();
      expect((await client.healthCheck('llm', `${backend.url}/health`)).status).toBe('healthy');
    });
  });

  describe('error classification', () => {
    it('should recognise connect and read timeout codes through the cause chain', () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
      const wrapped = new Error('request failed', { cause: refused });
      const headers = Object.assign(new Error('Headers Timeout Error'), { code: 'UND_ERR_HEADERS_TIMEOUT' });

      expect(isConnectError(wrapped)).toBe(true);
      expect(isReadTimeoutError(wrapped)).toBe(false);
      expect(isReadTimeoutError(headers)).toBe(true);
      expect(isConnectError(headers)).toBe(false);
      expect(isConnectError(new Error('plain'))).toBe(false);
    });
  });
});
