/**
 * streaming.ts
 * Relays a backend byte stream to the client
 */

import type { Response } from 'express';
import type { BackendResponse, BackendStream } from './backend-client.js';
import { ERROR_DETAIL_MAX_CHARS } from './constants/index.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('streaming');

/**
 * Resolves once the response can take more data or the client is gone
 */
export function waitForDrain(res: Response): Promise<void> {
  return new Promise(resolve => {
    const done = (): void => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

/**
 * Copy every chunk to the client, honoring write back-pressure. The upstream
 * body is cancelled as soon as the client goes away.
 */
export async function relayStream(res: Response, upstream: BackendStream): Promise<void> {
  let clientGone = false;
  const onClose = (): void => {
    if (!res.writableFinished) {
      clientGone = true;
      upstream.cancel();
    }
  };
  res.on('close', onClose);

  res.status(upstream.status);
  res.setHeader('Content-Type', upstream.contentType ?? 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
  res.flushHeaders();

  let chunkCount = 0;
  let totalBytes = 0;
  try {
    for await (const chunk of upstream.chunks()) {
      if (clientGone || res.writableEnded) {
        break;
      }
      chunkCount++;
      totalBytes += chunk.length;
      if (!res.write(chunk)) {
        await waitForDrain(res);
      }
    }
  } catch (error) {
    if (!clientGone) {
      log.warn(`Stream from ${upstream.backend} failed: ${getErrorMessage(error)}`);
    }
  } finally {
    res.off('close', onClose);
    upstream.cancel();
    if (!res.writableEnded) {
      res.end();
    }
    log.debug(`Stream from ${upstream.backend} finished`, { chunkCount, totalBytes, clientGone });
  }
}

/**
 * Pass a buffered backend response through: JSON bodies as they are, anything
 * else wrapped in `{ error, detail }`.
 */
export function sendBackendJson(res: Response, response: BackendResponse, errorLabel: string): void {
  let payload: unknown;
  try {
    payload = response.json();
  } catch {
    payload = { error: errorLabel, detail: response.text().slice(0, ERROR_DETAIL_MAX_CHARS) };
  }
  res.status(response.status).json(payload);
}

/**
 * Pass a buffered backend response through byte for byte
 */
export function sendBackendRaw(res: Response, response: BackendResponse): void {
  res.status(response.status);
  if (response.contentType) {
    res.setHeader('Content-Type', response.contentType);
  }
  const disposition = response.headers['content-disposition'];
  if (disposition) {
    res.setHeader('Content-Disposition', disposition);
  }
  res.send(response.body);
}
