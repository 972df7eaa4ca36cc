/**
 * Tests for retry and sleep helpers.
 */

import { describe, it, expect, vi } from 'vitest';
import { MAX_TIMER_MS, RetryExecutor, armDeadline, requireDuration, sleep } from '../client/resilience.js';
import { ConfigurationError, RequestFailedError, TransportError } from '../errors.js';

const fastRetry = { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 1, multiplier: 1 };

describe('RetryExecutor', () => {
  it('should return the first success', async () => {
    const executor = new RetryExecutor(fastRetry);
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(executor.execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry timeouts and notify the listener', async () => {
    const executor = new RetryExecutor(fastRetry);
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransportError('slow', { timeout: true }))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    await expect(executor.execute(fn, onRetry)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, 1, expect.any(TransportError));
  });

  it('should not retry other errors', async () => {
    const executor = new RetryExecutor(fastRetry);
    const fn = vi.fn().mockRejectedValue(new RequestFailedError(500, 'boom', ''));

    await expect(executor.execute(fn)).rejects.toBeInstanceOf(RequestFailedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should cap the delay', async () => {
    const executor = new RetryExecutor({ initialDelayMs: 100, maxDelayMs: 150, multiplier: 2 });
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new TransportError('slow', { timeout: true }));

    vi.useFakeTimers();
    try {
      const result = executor.execute(fn, onRetry).catch((e: unknown) => e);
      await vi.runAllTimersAsync();

      expect(await result).toBeInstanceOf(TransportError);
      expect(onRetry.mock.calls.map((call) => call[1])).toEqual([100, 150, 150]);
      expect(fn).toHaveBeenCalledTimes(4);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('kind', 'aborted');
  });

  it('should reject at once on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(TransportError);
  });
});

describe('armDeadline', () => {
  it('should chain timers for a deadline beyond one timer', () => {
    vi.useFakeTimers();
    try {
      const onExpire = vi.fn();
      const thirtyDays = 30 * 24 * 3600 * 1000;
      armDeadline(thirtyDays, onExpire);

      vi.advanceTimersByTime(MAX_TIMER_MS + 1);
      expect(onExpire).not.toHaveBeenCalled();

      vi.advanceTimersByTime(thirtyDays - MAX_TIMER_MS);
      expect(onExpire).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should not fire once cancelled', () => {
    vi.useFakeTimers();
    try {
      const onExpire = vi.fn();
      const cancel = armDeadline(100, onExpire);

      cancel();
      vi.advanceTimersByTime(200);

      expect(onExpire).not.toHaveBeenCalled();
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('requireDuration', () => {
  it('should return a positive finite duration', () => {
    expect(requireDuration(2_592_000_000, 'timeoutMs')).toBe(2_592_000_000);
  });

  it.each([Number.POSITIVE_INFINITY, Number.NaN, 0, -5])('should reject %s', (ms) => {
    expect(() => requireDuration(ms, 'timeoutMs')).toThrow(ConfigurationError);
  });

  it('should reject a value above the given bound', () => {
    expect(() => requireDuration(MAX_TIMER_MS + 1, 'pollIntervalMs', MAX_TIMER_MS)).toThrow(
      `Invalid option 'pollIntervalMs': expected a positive duration up to ${MAX_TIMER_MS}ms, got ${MAX_TIMER_MS + 1}`
    );
  });
});
