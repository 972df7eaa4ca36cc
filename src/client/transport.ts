/**
 * HTTP transport for the grid REST API.
 *
 * The transport only moves bytes; status interpretation happens in the client.
 *
 * @module client/transport
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import type { PoolConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { armDeadline, requireDuration } from './resilience.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * A single outgoing request.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * Raw response as seen by the transport.
 */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

/**
 * Default transport backed by undici with a connection pool owned by the transport.
 */
export class UndiciTransport implements HttpTransport {
  private readonly agent: Dispatcher;

  /**
   * @param dispatcher - Replaces the pooled agent, e.g. with an undici MockAgent
   */
  constructor(pool: PoolConfig, dispatcher?: Dispatcher) {
    this.agent = dispatcher ?? new Agent({
      connections: pool.connections,
      keepAliveTimeout: pool.keepAliveTimeoutMs,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    requireDuration(request.timeoutMs, 'timeoutMs');
    const controller = new AbortController();
    let timedOut = false;
    const cancelTimeout = armDeadline(request.timeoutMs, () => {
      timedOut = true;
      controller.abort();
    });
    const onCallerAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.agent,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw new TransportError(`Request to ${request.url} was cancelled`, { aborted: true, cause: error });
      }
      if (timedOut) {
        throw new TransportError(`Request timeout after ${request.timeoutMs}ms`, { timeout: true, cause: error });
      }
      const message = error instanceof Error ? error.message : 'Unknown network error';
      throw new TransportError(message, { cause: error });
    } finally {
      cancelTimeout();
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
