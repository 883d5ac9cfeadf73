/**
 * backend-client.ts
 * Pooled HTTP dispatch to inference backends with per-class timeouts,
 * retry with backoff on connect failures, and per-backend circuit breaking.
 */

import { Agent, request, type Dispatcher } from 'undici';
import type { IncomingHttpHeaders } from 'http';
import { CircuitBreakerRegistry } from './circuit-breaker.js';
import type { PoolConfig, TimeoutsConfig } from './config/schema.js';
import { ERROR_MESSAGES, HEALTH_CHECK_TIMEOUT_MS, TIMEOUT_CLASSES, type TimeoutClass } from './constants/index.js';
import { sleep } from './utils/async-helpers.js';
import { getErrorCode, getErrorMessage } from './utils/error-helpers.js';
import { BackendTimeoutError, BackendUnavailableError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('backend-client');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

type ResponseBody = Dispatcher.ResponseData['body'];

/**
 * Failures where no connection was established. These are retried and
 * counted against the backend's breaker.
 */
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Connected but the backend was too slow. Neither retried nor a breaker event.
 */
const READ_TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

export function isConnectError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && CONNECT_ERROR_CODES.has(code);
}

export function isReadTimeoutError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && READ_TIMEOUT_CODES.has(code);
}

function isTimeoutClass(value: string): value is TimeoutClass {
  return TIMEOUT_CLASSES.some(name => name === value);
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

export interface BackendRequestOptions {
  timeoutClass?: string;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Serialized as the request body with an application/json content type */
  json?: unknown;
  maxRetries?: number;
  signal?: AbortSignal;
}

/**
 * Fully buffered backend response
 */
export class BackendResponse {
  constructor(
    readonly status: number,
    readonly headers: Record<string, string>,
    readonly body: Buffer
  ) {}

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  get contentType(): string | undefined {
    return this.headers['content-type'];
  }

  text(): string {
    return this.body.toString('utf-8');
  }

  /**
   * @throws SyntaxError when the body is not JSON
   */
  json(): unknown {
    const parsed: unknown = JSON.parse(this.text());
    return parsed;
  }
}

/**
 * An open streaming response. The caller must either drain chunks() or cancel().
 */
export class BackendStream {
  constructor(
    readonly backend: string,
    readonly status: number,
    readonly headers: Record<string, string>,
    private readonly body: ResponseBody
  ) {}

  get contentType(): string | undefined {
    return this.headers['content-type'];
  }

  async *chunks(): AsyncGenerator<Buffer> {
    try {
      for await (const chunk of this.body) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      }
    } catch (error) {
      if (isReadTimeoutError(error)) {
        throw new BackendTimeoutError(this.backend, getErrorMessage(error));
      }
      throw error;
    }
  }

  /**
   * Buffer the remainder of the stream, used when the backend answered with an error status.
   */
  async readAll(): Promise<BackendResponse> {
    const parts: Buffer[] = [];
    for await (const chunk of this.chunks()) {
      parts.push(chunk);
    }
    return new BackendResponse(this.status, this.headers, Buffer.concat(parts));
  }

  cancel(): void {
    if (!this.body.destroyed) {
      this.body.destroy();
    }
  }
}

export type BackendHealth =
  | { status: 'healthy' | 'unhealthy'; code: number }
  | { status: 'unreachable'; error: string };

export interface BackendClientOptions {
  timeouts: TimeoutsConfig;
  pool: PoolConfig;
  maxRetries: number;
  retryDelaysMs: number[];
  breakers: CircuitBreakerRegistry;
  sleep?: (ms: number) => Promise<void>;
}

export class BackendClient {
  private readonly agent: Agent;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: BackendClientOptions) {
    this.agent = new Agent({
      connections: options.pool.connections,
      keepAliveTimeout: options.pool.keepAliveTimeoutMs,
      connect: { timeout: options.pool.connectTimeoutMs },
    });
    this.sleep = options.sleep ?? sleep;
  }

  get breakers(): CircuitBreakerRegistry {
    return this.options.breakers;
  }

  /**
   * Timeout for a named class; unknown classes use `default`
   */
  timeoutFor(timeoutClass: string): number {
    const { timeouts } = this.options;
    return isTimeoutClass(timeoutClass) ? timeouts[timeoutClass] : timeouts.default;
  }

  /**
   * Send a request and buffer the response. Connect failures are retried up
   * to maxRetries attempts; any HTTP status counts as success.
   *
   * @throws BackendUnavailableError when the breaker is open or retries are exhausted
   * @throws BackendTimeoutError when the backend accepted the request but answered too slowly
   */
  async request(
    backend: string,
    method: HttpMethod,
    url: string,
    options: BackendRequestOptions = {}
  ): Promise<BackendResponse> {
    const breaker = this.options.breakers.getOrCreate(backend);
    const maxRetries = Math.max(1, options.maxRetries ?? this.options.maxRetries);
    const delays = this.options.retryDelaysMs;
    const timeoutMs = this.timeoutFor(options.timeoutClass ?? 'default');
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      if (!breaker.allowRequest()) {
        throw new BackendUnavailableError(backend, ERROR_MESSAGES.CIRCUIT_OPEN(backend));
      }
      try {
        const response = await this.send(method, url, options, timeoutMs);
        breaker.recordSuccess();
        const body = Buffer.from(await response.body.arrayBuffer());
        return new BackendResponse(response.statusCode, flattenHeaders(response.headers), body);
      } catch (error) {
        if (isReadTimeoutError(error)) {
          throw new BackendTimeoutError(backend, getErrorMessage(error));
        }
        if (!isConnectError(error)) {
          throw error;
        }
        lastError = error;
        breaker.recordFailure();
        if (attempt < maxRetries - 1) {
          const delay = delays[Math.min(attempt, delays.length - 1)] ?? 0;
          log.warn(
            `${backend} attempt ${attempt + 1} failed: ${getErrorMessage(error)} (retry in ${delay}ms)`
          );
          await this.sleep(delay);
        }
      }
    }

    throw new BackendUnavailableError(backend, getErrorMessage(lastError), { cause: lastError });
  }

  /**
   * Open a streaming request. No retry; success is recorded once the response opens.
   */
  async stream(
    backend: string,
    method: HttpMethod,
    url: string,
    options: BackendRequestOptions = {}
  ): Promise<BackendStream> {
    const breaker = this.options.breakers.getOrCreate(backend);
    if (!breaker.allowRequest()) {
      throw new BackendUnavailableError(backend, ERROR_MESSAGES.CIRCUIT_OPEN(backend));
    }
    const timeoutMs = this.timeoutFor(options.timeoutClass ?? 'default');

    let response: Dispatcher.ResponseData;
    try {
      response = await this.send(method, url, options, timeoutMs);
    } catch (error) {
      if (isConnectError(error)) {
        breaker.recordFailure();
        throw new BackendUnavailableError(backend, getErrorMessage(error), { cause: error });
      }
      if (isReadTimeoutError(error)) {
        throw new BackendTimeoutError(backend, getErrorMessage(error));
      }
      throw error;
    }

    breaker.recordSuccess();
    return new BackendStream(backend, response.statusCode, flattenHeaders(response.headers), response.body);
  }

  /**
   * Single GET against a health endpoint. Never throws and bypasses the breaker.
   */
  async healthCheck(backend: string, url: string): Promise<BackendHealth> {
    try {
      const response = await request(url, {
        dispatcher: this.agent,
        method: 'GET',
        headersTimeout: HEALTH_CHECK_TIMEOUT_MS,
        bodyTimeout: HEALTH_CHECK_TIMEOUT_MS,
        signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS),
      });
      await response.body.text();
      return {
        status: response.statusCode === 200 ? 'healthy' : 'unhealthy',
        code: response.statusCode,
      };
    } catch (error) {
      log.debug(`Health check for ${backend} failed`, { error });
      return { status: 'unreachable', error: getErrorMessage(error) };
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private send(
    method: HttpMethod,
    url: string,
    options: BackendRequestOptions,
    timeoutMs: number
  ): Promise<Dispatcher.ResponseData> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    let body = options.body;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      headers['content-type'] ??= 'application/json';
    }
    return request(url, {
      dispatcher: this.agent,
      method,
      headers,
      body,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal: options.signal,
    });
  }
}
