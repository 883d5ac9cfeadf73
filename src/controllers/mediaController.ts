/**
 * mediaController.ts
 * Raw passthrough for the speech and audio backends
 */

import type { Request, Response } from 'express';
import type { HttpMethod } from '../backend-client.js';
import { ERROR_MESSAGES, type RouteFamily } from '../constants/index.js';
import type { GatewayContext } from '../gateway-context.js';
import { sendError } from '../middleware/errorHandler.js';
import { relayStream, sendBackendJson, sendBackendRaw } from '../streaming.js';

export type MediaFamily = Extract<RouteFamily, 'tts' | 'stt' | 'speakers' | 'audio'>;

const MEDIA_TIMEOUT_CLASS: Record<MediaFamily, string> = {
  tts: 'tts',
  stt: 'stt',
  speakers: 'speaker',
  audio: 'audio',
};

const FORWARDED_HEADERS = ['content-type', 'accept'] as const;

function toHttpMethod(method: string): HttpMethod {
  return method === 'GET' ? 'GET' : 'POST';
}

function queryString(originalUrl: string): string {
  const index = originalUrl.indexOf('?');
  return index === -1 ? '' : originalUrl.slice(index);
}

/**
 * Forward `/<family>/<sub-path>` to `<backend>/<sub-path>`. Sub-paths ending in
 * `/stream` are relayed as byte streams.
 */
export function proxyMedia(context: GatewayContext, family: MediaFamily) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const backend = context.config.routing[family];
      const url = `${context.registry.url(backend)}${req.path}${queryString(req.originalUrl)}`;
      const headers: Record<string, string> = {};
      for (const name of FORWARDED_HEADERS) {
        const value = req.headers[name];
        if (typeof value === 'string') {
          headers[name] = value;
        }
      }
      const body = Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined;
      const options = { headers, body, timeoutClass: MEDIA_TIMEOUT_CLASS[family] };
      const method = toHttpMethod(req.method);

      if (req.path.endsWith('/stream')) {
        const upstream = await context.client.stream(backend, method, url, options);
        if (upstream.status >= 400) {
          sendBackendJson(res, await upstream.readAll(), ERROR_MESSAGES.BACKEND_ERROR);
          return;
        }
        await relayStream(res, upstream);
        return;
      }

      sendBackendRaw(res, await context.client.request(backend, method, url, options));
    } catch (error) {
      sendError(res, error, `${family} proxy`);
    }
  };
}
