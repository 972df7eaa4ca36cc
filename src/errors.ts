/**
 * Error types for the grid reservation client.
 * @module errors
 */

/**
 * Error kinds for categorizing reservation errors.
 */
export enum ReservationErrorKind {
  // Configuration errors
  Configuration = 'configuration',

  // Authentication errors
  Unauthorized = 'unauthorized',

  // Resource errors
  NotFound = 'not_found',

  // Request errors
  BadRequest = 'bad_request',
  Forbidden = 'forbidden',
  Conflict = 'conflict',
  ServerError = 'server_error',
  RequestFailed = 'request_failed',

  // Network errors
  Timeout = 'timeout',
  NetworkError = 'network_error',
  Aborted = 'aborted',

  // Response errors
  Deserialization = 'deserialization',

  // Lifecycle errors
  JobFailed = 'job_failed',
  DeploymentFailed = 'deployment_failed',
  TimedOut = 'timed_out',
}

/**
 * Base class of every error raised by this package.
 */
export class ReservationError extends Error {
  /** Error kind */
  readonly kind: ReservationErrorKind;
  /** HTTP status code, when the error comes from a response */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    kind: ReservationErrorKind;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'ReservationError';
    this.kind = options.kind;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }
}

// ============================================================================
// Caller errors (never reach the network)
// ============================================================================

/**
 * Invalid or conflicting request or client options.
 */
export class ConfigurationError extends ReservationError {
  /** Name of the offending option, when one can be identified */
  readonly option?: string;

  constructor(message: string, option?: string) {
    super({
      kind: ReservationErrorKind.Configuration,
      message,
      details: option ? { option } : undefined,
    });
    this.name = 'ConfigurationError';
    this.option = option;
  }
}

// ============================================================================
// Transport errors
// ============================================================================

/**
 * Network-level failure. Only timeouts are retried.
 */
export class TransportError extends ReservationError {
  readonly timeout: boolean;

  constructor(message: string, options: { timeout?: boolean; aborted?: boolean; cause?: unknown } = {}) {
    super({
      kind: options.timeout
        ? ReservationErrorKind.Timeout
        : options.aborted
          ? ReservationErrorKind.Aborted
          : ReservationErrorKind.NetworkError,
      message,
      cause: options.cause,
    });
    this.name = 'TransportError';
    this.timeout = options.timeout ?? false;
  }
}

/**
 * Credentials rejected by the service (HTTP 401).
 */
export class AuthenticationError extends ReservationError {
  constructor(message: string = 'Credentials are not recognized') {
    super({
      kind: ReservationErrorKind.Unauthorized,
      message,
      statusCode: 401,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Referenced site, job or resource does not exist (HTTP 404).
 */
export class NotFoundError extends ReservationError {
  constructor(message: string, resource?: string) {
    super({
      kind: ReservationErrorKind.NotFound,
      message,
      statusCode: 404,
      details: resource ? { resource } : undefined,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Any other 4xx/5xx response. Carries the raw response body.
 */
export class RequestFailedError extends ReservationError {
  readonly body: string;

  constructor(statusCode: number, message: string, body: string) {
    super({
      kind: RequestFailedError.kindFromStatus(statusCode),
      message,
      statusCode,
      details: { body },
    });
    this.name = 'RequestFailedError';
    this.body = body;
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): ReservationErrorKind {
    switch (status) {
      case 400:
        return ReservationErrorKind.BadRequest;
      case 403:
        return ReservationErrorKind.Forbidden;
      case 409:
        return ReservationErrorKind.Conflict;
      default:
        return status >= 500 ? ReservationErrorKind.ServerError : ReservationErrorKind.RequestFailed;
    }
  }
}

/**
 * Response body did not have the expected shape.
 */
export class DeserializationError extends ReservationError {
  constructor(message: string, cause?: unknown) {
    super({ kind: ReservationErrorKind.Deserialization, message, cause });
    this.name = 'DeserializationError';
  }
}

// ============================================================================
// Lifecycle errors
// ============================================================================

/**
 * Job ended without ever reaching the running state.
 */
export class JobFailedError extends ReservationError {
  readonly jobUid: string;
  readonly state: string;

  constructor(jobUid: string, state: string) {
    super({
      kind: ReservationErrorKind.JobFailed,
      message: `Job ${jobUid} reached state '${state}' before running`,
      details: { jobUid, state },
    });
    this.name = 'JobFailedError';
    this.jobUid = jobUid;
    this.state = state;
  }
}

/**
 * OS deployment did not succeed on every node.
 */
export class DeploymentFailedError extends ReservationError {
  readonly deploymentUid: string;
  readonly status: string;
  /** Nodes whose result was not OK, with the state the service reported */
  readonly failures: Record<string, string>;

  constructor(deploymentUid: string, status: string, failures: Record<string, string>) {
    const failed = Object.keys(failures).sort();
    const suffix = failed.length > 0 ? ` (failed nodes: ${failed.join(', ')})` : '';
    super({
      kind: ReservationErrorKind.DeploymentFailed,
      message: `Deployment ${deploymentUid} ended with status '${status}'${suffix}`,
      details: { deploymentUid, status, failures },
    });
    this.name = 'DeploymentFailedError';
    this.deploymentUid = deploymentUid;
    this.status = status;
    this.failures = failures;
  }
}

/**
 * A bounded wait exceeded its deadline. The remote resource is left untouched.
 */
export class TimedOutError extends ReservationError {
  readonly subject: string;
  readonly lastState?: string;
  readonly timeoutMs: number;

  constructor(subject: string, timeoutMs: number, lastState?: string) {
    const observed = lastState ? ` (last state: ${lastState})` : '';
    super({
      kind: ReservationErrorKind.TimedOut,
      message: `Timed out after ${timeoutMs}ms waiting for ${subject}${observed}`,
      details: { subject, timeoutMs, lastState },
    });
    this.name = 'TimedOutError';
    this.subject = subject;
    this.timeoutMs = timeoutMs;
    this.lastState = lastState;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for ReservationError.
 */
export function isReservationError(error: unknown): error is ReservationError {
  return error instanceof ReservationError;
}

/**
 * True for a transport timeout, the only error the client retries.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.timeout;
}

/**
 * True when the service refused a cancellation because the job had already ended.
 */
export function isAlreadyTerminated(error: unknown): boolean {
  return (
    error instanceof RequestFailedError &&
    error.kind === ReservationErrorKind.ServerError &&
    (error.body.includes('already killed') || error.message.includes('already killed'))
  );
}
