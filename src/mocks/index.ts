/**
 * Mocks for testing code built on the grid client.
 */

import { sleep } from '../client/resilience.js';
import type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from '../client/transport.js';
import { TransportError } from '../errors.js';

/**
 * Mock response configuration
 */
export interface MockResponse {
  status?: number;
  /** Serialized as JSON unless already a string */
  body?: unknown;
  headers?: Record<string, string>;
  delayMs?: number;
  /** Fail with a transport timeout instead of answering */
  timeout?: boolean;
}

/**
 * Mock request matcher. A string path must equal the URL path exactly.
 */
export interface MockMatcher {
  method?: HttpMethod;
  path?: string | RegExp;
}

export interface RecordedCall {
  method: HttpMethod;
  url: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: unknown;
}

interface Route {
  matcher: MockMatcher;
  responses: MockResponse[];
}

/**
 * In-process transport. Each route answers with its responses in order and
 * keeps repeating the last one.
 */
export class MockTransport implements HttpTransport {
  private routes: Route[] = [];
  private calls: RecordedCall[] = [];
  private closed = false;

  /**
   * Add a route. Earlier routes win when several match.
   */
  mock(matcher: MockMatcher, ...responses: MockResponse[]): this {
    this.routes.push({ matcher, responses: responses.length > 0 ? responses : [{}] });
    return this;
  }

  /** Shorthand for a GET route answering with JSON bodies in sequence */
  onGet(path: string | RegExp, ...bodies: unknown[]): this {
    return this.mock({ method: 'GET', path }, ...bodies.map((body) => ({ body })));
  }

  onPost(path: string | RegExp, body: unknown, status = 201): this {
    return this.mock({ method: 'POST', path }, { status, body });
  }

  onDelete(path: string | RegExp, ...responses: MockResponse[]): this {
    return this.mock({ method: 'DELETE', path }, ...responses);
  }

  getCalls(): RecordedCall[] {
    return this.calls;
  }

  getCallsTo(method: HttpMethod, path: string | RegExp): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && matchesPath(path, call.path));
  }

  reset(): this {
    this.routes = [];
    this.calls = [];
    return this;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.url);
    const body: unknown = request.body === undefined ? undefined : JSON.parse(request.body);
    this.calls.push({
      method: request.method,
      url: request.url,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams),
      headers: request.headers,
      body,
    });

    if (request.signal?.aborted) {
      throw new TransportError('Request aborted', { aborted: true });
    }

    const route = this.routes.find(({ matcher }) =>
      (matcher.method === undefined || matcher.method === request.method) &&
      (matcher.path === undefined || matchesPath(matcher.path, url.pathname))
    );
    if (!route) {
      return {
        status: 404,
        headers: {},
        body: JSON.stringify({ message: `No mock for ${request.method} ${url.pathname}` }),
      };
    }

    const response = route.responses.length > 1 ? route.responses.shift() : route.responses[0];
    if (!response) {
      throw new Error(`Mock route for ${request.method} ${url.pathname} has no responses`);
    }

    if (response.delayMs) {
      await sleep(response.delayMs, request.signal);
    }

    if (response.timeout) {
      throw new TransportError(`Request timed out after ${request.timeoutMs}ms`, { timeout: true });
    }

    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      body: response.body === undefined
        ? ''
        : typeof response.body === 'string' ? response.body : JSON.stringify(response.body),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function matchesPath(pattern: string | RegExp, path: string): boolean {
  return typeof pattern === 'string' ? pattern === path : pattern.test(path);
}
