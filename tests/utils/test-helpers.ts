/**
 * Test utilities for the gateway
 * In-process HTTP servers, a scripted LLM router and config builders
 */

import type { Server } from 'http';
import express, { type Express } from 'express';
import { parseGatewayConfig } from '../../src/config/config.js';
import type { GatewayConfig } from '../../src/config/schema.js';
import type { ModelStatus } from '../../src/gateway.types.js';

export interface TestServer {
  url: string;
  port: number;
  server: Server;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port
 */
export function startTestServer(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1');
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      const { port } = address;
      resolve({
        url: `http://127.0.0.1:${port}`,
        port,
        server,
        close: () =>
          new Promise<void>(done => {
            server.closeAllConnections();
            server.close(() => done());
          }),
      });
    });
  });
}

/**
 * URL of a loopback port that nothing listens on
 */
export async function closedPortUrl(): Promise<string> {
  const probe = await startTestServer(express());
  await probe.close();
  return probe.url;
}

export function testConfig(overrides: Record<string, unknown> = {}): GatewayConfig {
  return parseGatewayConfig(overrides);
}

export const noSleep = async (): Promise<void> => {};

/**
 * Sleep that only advances a fake clock
 */
export function fakeClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    sleep: async (ms: number) => {
      current += ms;
    },
  };
}

export interface MockModel {
  id: string;
  status: ModelStatus;
  /** GET /models calls a loading model takes to become loaded */
  pollsUntilLoaded?: number;
}

export type LoadBehavior = 'succeed' | 'fail' | 'never' | 'reject';

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

export interface MockRouter {
  app: Express;
  models: Map<string, MockModel>;
  requests: RecordedRequest[];
  setLoadBehavior(behavior: LoadBehavior): void;
  calls(method: string, path: string): RecordedRequest[];
  /** Resolves when the next held chat stream is closed by the gateway */
  nextHeldStreamClose(): Promise<void>;
}

export function mockModel(id: string, value: ModelStatus['value'] = 'unloaded', args: string[] = []): MockModel {
  return { id, status: { value, failed: false, args } };
}

/**
 * An LLM router backend: model registry, load/unload commands and an echoing
 * chat completion endpoint.
 */
export function createMockRouter(initial: MockModel[]): MockRouter {
  const models = new Map(initial.map(model => [model.id, model]));
  const requests: RecordedRequest[] = [];
  let loadBehavior: LoadBehavior = 'succeed';
  const closeWaiters: Array<() => void> = [];

  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    requests.push({ method: req.method, path: req.path, body: req.body });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/models', (_req, res) => {
    for (const model of models.values()) {
      if (model.status.value !== 'loading' || loadBehavior === 'never') {
        continue;
      }
      if (loadBehavior === 'fail') {
        model.status = { ...model.status, value: 'unloaded', failed: true };
        continue;
      }
      const remaining = (model.pollsUntilLoaded ?? 1) - 1;
      model.pollsUntilLoaded = remaining;
      if (remaining <= 0) {
        model.status = { ...model.status, value: 'loaded' };
      }
    }
    res.json({ object: 'list', data: [...models.values()].map(({ id, status }) => ({ id, status })) });
  });

  app.post('/models/load', (req, res) => {
    const model = models.get(String(req.body?.model));
    if (!model || loadBehavior === 'reject') {
      res.status(model ? 500 : 404).json({ error: 'load rejected' });
      return;
    }
    model.status = { ...model.status, value: 'loading', failed: false };
    res.json({ success: true });
  });

  app.post('/models/unload', (req, res) => {
    const model = models.get(String(req.body?.model));
    if (!model) {
      res.status(404).json({ error: 'not found' });
      return;
    }
    model.status = { ...model.status, value: 'unloaded' };
    res.json({ success: true });
  });

  // `stream: true` answers with SSE chunks; `hold: true` leaves the stream open
  app.post('/v1/chat/completions', (req, res) => {
    if (req.body?.stream !== true) {
      res.json({ object: 'chat.completion', echo: req.body });
      return;
    }
    res.setHeader('Content-Type', 'text/event-stream');
    res.write('data: {"delta":"Hel"}\n\n');
    if (req.body.hold === true) {
      res.on('close', () => {
        for (const resolve of closeWaiters.splice(0)) {
          resolve();
        }
      });
      return;
    }
    res.write('data: {"delta":"lo"}\n\n');
    res.end('data: [DONE]\n\n');
  });

  return {
    app,
    models,
    requests,
    setLoadBehavior: behavior => {
      loadBehavior = behavior;
    },
    calls: (method, path) => requests.filter(r => r.method === method && r.path === path),
    nextHeldStreamClose: () =>
      new Promise<void>(resolve => {
        closeWaiters.push(resolve);
      }),
  };
}
