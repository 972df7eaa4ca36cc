/**
 * Configuration for the grid reservation client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel } from './observability/index.js';

/** Default API base URL. */
export const DEFAULT_BASE_URL = 'https://api.grid5000.fr';

/** Default API version segment prepended to every catalogue path. */
export const DEFAULT_API_VERSION = 'sid';

/** Default request timeout in milliseconds (15 seconds). */
export const DEFAULT_TIMEOUT = 15000;

/** Default domain appended to node names found on switch ports. */
export const DEFAULT_NODE_DOMAIN = 'grid5000.fr';

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'grid-reservations/0.1.0';

/**
 * Retry configuration. Only transport timeouts on GET and DELETE are retried.
 */
export interface RetryConfig {
  /** Maximum retry attempts after the first failure. */
  maxRetries: number;
  /** Delay before the first retry in milliseconds. */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds. */
  maxDelayMs: number;
  /** Backoff multiplier. 1 keeps the delay fixed. */
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 1000,
  multiplier: 1,
};

/**
 * Connection pool owned by one client.
 */
export interface PoolConfig {
  /** Maximum sockets per origin. */
  connections: number;
  /** Keep-alive timeout for idle sockets in milliseconds. */
  keepAliveTimeoutMs: number;
}

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  connections: 8,
  keepAliveTimeoutMs: 10000,
};

/**
 * Basic authentication credentials. Omit when calling from inside the platform.
 */
export interface BasicAuthCredentials {
  username: string;
  password: string;
}

/**
 * Resolved client configuration.
 */
export interface GridConfig {
  /** API base URL (e.g., "https://api.grid5000.fr"). */
  baseUrl: string;
  /** API version segment (e.g., "sid" or "stable"). */
  apiVersion: string;
  /** Optional credentials. */
  auth?: BasicAuthCredentials;
  /** Platform user owning the jobs; defaults to the credentials' username. */
  user?: string;
  /** Request timeout in milliseconds. */
  timeoutMs: number;
  /** Retry configuration. */
  retry: RetryConfig;
  /** Connection pool configuration. */
  pool: PoolConfig;
  /** Domain appended to short node names. */
  nodeDomain: string;
  /** User-Agent header. */
  userAgent: string;
  /** Minimum level of the default console logger. */
  logLevel: LogLevel;
}

/**
 * Zod schema for a client configuration.
 */
export const GridConfigSchema = z.object({
  baseUrl: z.string().url().refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Base URL must start with http:// or https://'
  ),
  apiVersion: z.string().min(1).regex(/^[A-Za-z0-9._-]+$/, 'API version must be a single path segment'),
  auth: z.object({
    username: z.string().min(1),
    password: z.string().min(1),
  }).optional(),
  user: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive(),
  retry: z.object({
    maxRetries: z.number().int().nonnegative(),
    initialDelayMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    multiplier: z.number().positive(),
  }),
  pool: z.object({
    connections: z.number().int().positive(),
    keepAliveTimeoutMs: z.number().int().positive(),
  }),
  nodeDomain: z.string().min(1),
  userAgent: z.string().min(1),
  logLevel: z.nativeEnum(LogLevel),
});

/**
 * Creates a default configuration.
 */
export function createDefaultConfig(): GridConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    apiVersion: DEFAULT_API_VERSION,
    timeoutMs: DEFAULT_TIMEOUT,
    retry: { ...DEFAULT_RETRY_CONFIG },
    pool: { ...DEFAULT_POOL_CONFIG },
    nodeDomain: DEFAULT_NODE_DOMAIN,
    userAgent: DEFAULT_USER_AGENT,
    logLevel: LogLevel.Info,
  };
}

/**
 * Validates a configuration.
 * @throws {ConfigurationError} naming the first invalid option.
 */
export function validateConfig(config: GridConfig): GridConfig {
  const result = GridConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue ? issue.path.join('.') : undefined;
    const message = issue ? issue.message : 'Invalid configuration';
    throw new ConfigurationError(option ? `Invalid option '${option}': ${message}` : message, option);
  }
  return config;
}

/**
 * Merges a partial configuration over the defaults and validates the result.
 */
export function resolveConfig(config: Partial<GridConfig> = {}): GridConfig {
  const defaults = createDefaultConfig();
  return validateConfig({
    ...defaults,
    ...config,
    baseUrl: (config.baseUrl ?? defaults.baseUrl).replace(/\/+$/, ''),
    retry: { ...defaults.retry, ...config.retry },
    pool: { ...defaults.pool, ...config.pool },
  });
}

/**
 * Builder for GridConfig.
 */
export class GridConfigBuilder {
  private config: GridConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  baseUrl(url: string): this {
    this.config.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets basic authentication credentials.
   */
  credentials(username: string, password: string): this {
    this.config.auth = { username, password };
    return this;
  }

  user(user: string): this {
    this.config.user = user;
    return this;
  }

  timeout(timeoutMs: number): this {
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  retry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  /**
   * Disables retries.
   */
  noRetry(): this {
    this.config.retry = { ...this.config.retry, maxRetries: 0 };
    return this;
  }

  pool(config: Partial<PoolConfig>): this {
    this.config.pool = { ...this.config.pool, ...config };
    return this;
  }

  nodeDomain(domain: string): this {
    this.config.nodeDomain = domain;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): GridConfig {
    return validateConfig({
      ...this.config,
      retry: { ...this.config.retry },
      pool: { ...this.config.pool },
    });
  }
}

function parseIntegerEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer, got '${value}'`, name);
  }
  return parsed;
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - GRID_API_URL: Base URL
 * - GRID_API_VERSION: API version segment
 * - GRID_USER / GRID_PASSWORD: Basic authentication (both required to enable it)
 * - GRID_TIMEOUT_MS: Request timeout in milliseconds
 * - GRID_MAX_RETRIES: Maximum retry attempts on timeouts
 * - GRID_LOG_LEVEL: trace, debug, info, warn or error
 * - USER: job owner when GRID_USER is not set
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GridConfigBuilder {
  const builder = new GridConfigBuilder();

  if (env.GRID_API_URL) {
    builder.baseUrl(env.GRID_API_URL);
  }

  if (env.GRID_API_VERSION) {
    builder.apiVersion(env.GRID_API_VERSION);
  }

  const user = env.GRID_USER ?? env.USER;
  if (user) {
    builder.user(user);
  }

  if (env.GRID_USER && env.GRID_PASSWORD) {
    builder.credentials(env.GRID_USER, env.GRID_PASSWORD);
  }

  if (env.GRID_TIMEOUT_MS) {
    builder.timeout(parseIntegerEnv('GRID_TIMEOUT_MS', env.GRID_TIMEOUT_MS));
  }

  if (env.GRID_MAX_RETRIES) {
    builder.retry({ maxRetries: parseIntegerEnv('GRID_MAX_RETRIES', env.GRID_MAX_RETRIES) });
  }

  if (env.GRID_LOG_LEVEL) {
    const level = parseLogLevel(env.GRID_LOG_LEVEL);
    if (level === undefined) {
      throw new ConfigurationError(`Unknown log level '${env.GRID_LOG_LEVEL}'`, 'GRID_LOG_LEVEL');
    }
    builder.logLevel(level);
  }

  return builder;
}
