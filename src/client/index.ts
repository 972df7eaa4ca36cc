/**
 * Grid REST client
 *
 * Explicitly constructed handle to the scheduling platform's REST API with:
 * - Basic authentication (optional inside the platform)
 * - Its own connection pool, released by `close()`
 * - Retry of transport timeouts on idempotent requests
 * - Status-to-error mapping
 *
 * @module client
 */

import type { GridConfig } from '../config.js';
import { resolveConfig, createConfigFromEnv } from '../config.js';
import {
  AuthenticationError,
  ConfigurationError,
  DeserializationError,
  NotFoundError,
  RequestFailedError,
  type ReservationError,
} from '../errors.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import { RetryExecutor } from './resilience.js';
import {
  UndiciTransport,
  type HttpMethod,
  type HttpTransport,
  type TransportResponse,
} from './transport.js';

export type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from './transport.js';
export { UndiciTransport } from './transport.js';
export { RetryExecutor, sleep } from './resilience.js';

/**
 * HTTP request options.
 */
export interface RequestOptions {
  /** Query parameters */
  query?: Record<string, string | number | boolean | undefined>;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Cancels the request, including pending retries */
  signal?: AbortSignal;
}

/**
 * HTTP response structure. The body is left unparsed as `unknown`; callers
 * validate it into typed records.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
}

/**
 * Client construction options.
 */
export interface GridClientOptions {
  config?: Partial<GridConfig>;
  /** Replaces the default undici transport */
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Main grid API client.
 */
export class GridClient {
  readonly config: GridConfig;
  readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly retryExecutor: RetryExecutor;

  constructor(options: GridClientOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? new ConsoleLogger({ level: this.config.logLevel });
    this.transport = options.transport ?? new UndiciTransport(this.config.pool);
    this.retryExecutor = new RetryExecutor(this.config.retry);
  }

  /**
   * Prefixes a catalogue path with the API version, avoiding `//`.
   */
  apiPath(path: string): string {
    const trimmed = path.replace(/^\/+/, '');
    return `/${this.config.apiVersion}/${trimmed}`;
  }

  /**
   * User owning jobs submitted through this client.
   * @throws {ConfigurationError} if neither a user nor credentials are configured.
   */
  getUser(): string {
    const user = this.config.user ?? this.config.auth?.username;
    if (!user) {
      throw new ConfigurationError('No platform user configured; set `user` or credentials', 'user');
    }
    return user;
  }

  async get(path: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('GET', path, undefined, options);
  }

  /**
   * POST a JSON body. Never retried: creating a resource is not idempotent.
   */
  async post(path: string, body: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('POST', path, body, options);
  }

  async delete(path: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('DELETE', path, undefined, options);
  }

  /**
   * Checks that the API answers and accepts the credentials.
   */
  async verifyConnection(): Promise<void> {
    try {
      await this.get(this.apiPath(''));
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw new AuthenticationError('Your platform credentials are not recognized');
      }
      throw error;
    }
  }

  /**
   * Releases the connection pool.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  private async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    const url = this.buildUrl(path, options.query);
    const send = (): Promise<HttpResponse> => this.performRequest(method, url, body, options);

    if (method === 'POST') {
      return send();
    }

    return this.retryExecutor.execute(send, (attempt, delayMs, error) => {
      this.logger.warn('Request timed out, retrying', {
        method,
        url,
        attempt,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
    }, options.signal);
  }

  private async performRequest(
    method: HttpMethod,
    url: string,
    body: unknown,
    options: RequestOptions
  ): Promise<HttpResponse> {
    this.logger.trace('Sending request', { method, url });

    const response = await this.transport.send({
      method,
      url,
      headers: this.buildHeaders(body !== undefined),
      body: body === undefined ? undefined : JSON.stringify(body),
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      signal: options.signal,
    });

    if (response.status < 200 || response.status >= 300) {
      throw this.parseErrorResponse(url, response);
    }

    return {
      status: response.status,
      headers: response.headers,
      data: this.parseResponseBody(url, response),
    };
  }

  private buildUrl(
    path: string,
    query?: Record<string, string | number | boolean | undefined>
  ): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    const url = /^https?:\/\//.test(path)
      ? new URL(path)
      : new URL(`${this.config.baseUrl}${normalizedPath}`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      }
    }

    return url.toString();
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.config.userAgent,
    };

    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    if (this.config.auth) {
      const encoded = Buffer.from(
        `${this.config.auth.username}:${this.config.auth.password}`
      ).toString('base64');
      headers['Authorization'] = `Basic ${encoded}`;
    }

    return headers;
  }

  private parseResponseBody(url: string, response: TransportResponse): unknown {
    if (response.status === 204 || response.body.trim() === '') {
      return undefined;
    }

    try {
      const data: unknown = JSON.parse(response.body);
      return data;
    } catch (error) {
      throw new DeserializationError(`Failed to parse JSON response from ${url}`, error);
    }
  }

  private parseErrorResponse(url: string, response: TransportResponse): ReservationError {
    const message = extractErrorMessage(response.body) ?? `HTTP ${response.status} error`;

    switch (response.status) {
      case 401:
        return new AuthenticationError(message);
      case 404:
        return new NotFoundError(`Resource not found: ${url}`, url);
      default:
        return new RequestFailedError(response.status, message, response.body);
    }
  }
}

/**
 * Pulls a human-readable message out of an error body.
 */
function extractErrorMessage(body: string): string | undefined {
  const text = body.trim();
  if (text === '') return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return truncate(text);
  }

  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return truncate(text);
}

function truncate(text: string): string {
  return text.length > 500 ? `${text.slice(0, 500)}...` : text;
}

/**
 * Create a new client instance.
 */
export function createClient(options: GridClientOptions = {}): GridClient {
  return new GridClient(options);
}

/**
 * Create a client from environment variables (see `createConfigFromEnv`).
 */
export function createClientFromEnv(options: Omit<GridClientOptions, 'config'> = {}): GridClient {
  return new GridClient({ ...options, config: createConfigFromEnv().build() });
}

/**
 * Create a client and check the connection before returning it.
 */
export async function connect(options: GridClientOptions = {}): Promise<GridClient> {
  const client = new GridClient(options);
  try {
    await client.verifyConnection();
  } catch (error) {
    await client.close();
    throw error;
  }
  return client;
}
