/**
 * Logging for the grid reservation client.
 *
 * Log context is a flat record. Three keys are understood by every logger:
 * `site`, `job` and `deployment`, which together name the resource a line is
 * about. Loggers render them as a `site/job` subject ahead of the message.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Parses a level name such as "debug" or "WARN".
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'trace':
      return LogLevel.Trace;
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return undefined;
  }
}

const SUBJECT_KEYS = ['site', 'job', 'deployment'] as const;

/**
 * Resource a log line is about, e.g. `nancy/42` or `nancy/D-7`.
 */
export function subjectOf(context: LogContext): string | undefined {
  const parts = SUBJECT_KEYS
    .map((key) => context[key])
    .filter((value): value is string | number => typeof value === 'string' || typeof value === 'number');
  return parts.length > 0 ? parts.join('/') : undefined;
}

// Basic auth and the SSH key sent with a deployment.
const CREDENTIAL_KEYS = new Set(['password', 'authorization', 'sshkey', 'key', 'secret', 'token']);

const URL_PASSWORD = /(\/\/[^/:@\s]+:)[^@\s]+@/g;

/**
 * Copies a context with credential fields and URL passwords replaced.
 */
export function redact(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (CREDENTIAL_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      result[key] = value.replace(URL_PASSWORD, '$1[REDACTED]@');
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)) {
      result[key] = redact(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Level methods shared by the concrete loggers.
 */
abstract class BaseLogger implements Logger {
  protected constructor(protected readonly context: LogContext) {}

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.Trace, message, { ...this.context, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.Debug, message, { ...this.context, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.Info, message, { ...this.context, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.Warn, message, { ...this.context, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.Error, message, { ...this.context, ...context });
  }

  abstract child(context: LogContext): Logger;

  protected abstract write(level: LogLevel, message: string, context: LogContext): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  format?: 'json' | 'pretty';
}

/**
 * Writes to the console, warnings and errors to stderr.
 *
 * Pretty lines read `[time] INFO nancy/42: Reservation ready {...}`. JSON
 * lines carry the subject fields as they are.
 */
export class ConsoleLogger extends BaseLogger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'pretty';

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.Info;
    this.format = options.format ?? 'pretty';
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    if (level < this.level) return;

    const fields = redact(context);
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();
    const out = level >= LogLevel.Warn ? console.error : console.log;

    if (this.format === 'json') {
      out(JSON.stringify({ timestamp, level: levelName, message, ...fields }));
      return;
    }

    const subject = subjectOf(fields);
    const rest = Object.fromEntries(
      Object.entries(fields).filter(([key]) => !SUBJECT_KEYS.some((subjectKey) => subjectKey === key))
    );
    const prefix = subject ? `${subject}: ` : '';
    const suffix = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    out(`[${timestamp}] ${levelName} ${prefix}${message}${suffix}`);
  }
}

export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

/**
 * A captured log line.
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Keeps every line in memory; children append to the same list.
 */
export class InMemoryLogger extends BaseLogger {
  private readonly logs: LogRecord[];

  constructor(context: LogContext = {}, sink: LogRecord[] = []) {
    super(context);
    this.logs = sink;
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.logs);
  }

  getLogs(): LogRecord[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogRecord[] {
    return this.logs.filter((log) => log.level === level);
  }

  /**
   * Lines about one resource, e.g. `nancy/42`.
   */
  getLogsFor(subject: string): LogRecord[] {
    return this.logs.filter((log) => subjectOf(log.context) === subject);
  }

  getMessages(): string[] {
    return this.logs.map((log) => log.message);
  }

  clear(): void {
    this.logs.length = 0;
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    this.logs.push({ level, message, context, timestamp: new Date() });
  }
}
