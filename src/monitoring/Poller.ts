/**
 * Deadline-bounded poller.
 *
 * Repeats fetch → inspect → sleep until the inspected value is final. The
 * deadline aborts an AbortController, so it also cancels a request in
 * flight when it fires.
 *
 * @module monitoring/Poller
 */

import { MAX_TIMER_MS, armDeadline, requireDuration, sleep } from '../client/resilience.js';
import { TimedOutError, TransportError } from '../errors.js';

export interface PollerConfig {
  /** Delay between two fetches in milliseconds */
  intervalMs: number;
  /** Overall deadline in milliseconds */
  timeoutMs: number;
}

export const DEFAULT_POLLER_CONFIG: PollerConfig = {
  intervalMs: 5000,
  timeoutMs: 36_000_000, // 10 hours
};

/**
 * One polling job.
 */
export interface PollTask<T> {
  /** Identifier used in timeout errors, e.g. `nancy/1234` */
  subject: string;
  /** Reads the current value; must honour the signal */
  fetch: (signal: AbortSignal) => Promise<T>;
  /** Returns true once `value` is final. May throw to end polling with an error. */
  isDone: (value: T) => boolean;
  /** State reported in TimedOutError */
  stateOf: (value: T) => string;
  onUpdate?: (value: T) => void | Promise<void>;
}

export class Poller {
  private readonly config: PollerConfig;
  private abortController: AbortController | null = null;

  /**
   * @throws {ConfigurationError} for a non-finite or non-positive interval or deadline.
   */
  constructor(config: Partial<PollerConfig> = {}) {
    const merged = { ...DEFAULT_POLLER_CONFIG, ...config };
    this.config = {
      intervalMs: requireDuration(merged.intervalMs, 'pollIntervalMs', MAX_TIMER_MS),
      timeoutMs: requireDuration(merged.timeoutMs, 'timeoutMs'),
    };
  }

  /**
   * Poll until `task.isDone` accepts a value.
   *
   * @throws {TimedOutError} when the deadline passes first.
   * @throws {TransportError} with kind `aborted` when `signal` or `stop()` cancels.
   */
  async poll<T>(task: PollTask<T>, signal?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    this.abortController = controller;

    let deadlineReached = false;
    let lastState: string | undefined;

    const cancelDeadline = armDeadline(this.config.timeoutMs, () => {
      deadlineReached = true;
      controller.abort();
    });
    const onCallerAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      for (;;) {
        if (controller.signal.aborted) {
          throw new TransportError(`Polling ${task.subject} was aborted`, { aborted: true });
        }

        const value = await task.fetch(controller.signal);
        lastState = task.stateOf(value);

        if (task.onUpdate) {
          await task.onUpdate(value);
        }

        if (task.isDone(value)) {
          return value;
        }

        await sleep(this.config.intervalMs, controller.signal);
      }
    } catch (error) {
      if (deadlineReached) {
        throw new TimedOutError(task.subject, this.config.timeoutMs, lastState);
      }
      if (controller.signal.aborted && error instanceof TransportError) {
        throw new TransportError(`Polling ${task.subject} was aborted`, { aborted: true, cause: error });
      }
      throw error;
    } finally {
      cancelDeadline();
      signal?.removeEventListener('abort', onCallerAbort);
      this.abortController = null;
    }
  }

  /**
   * Cancel the poll in progress, if any.
   */
  stop(): void {
    this.abortController?.abort();
  }

  isPolling(): boolean {
    return this.abortController !== null;
  }

  getConfig(): Readonly<PollerConfig> {
    return { ...this.config };
  }
}
