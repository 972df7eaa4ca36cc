/**
 * Tests for the poller and state machines.
 */

import { describe, it, expect, vi } from 'vitest';
import { TimedOutError, TransportError } from '../errors.js';
import { Poller } from '../monitoring/Poller.js';
import {
  DeploymentStateMachine,
  ReservationStateMachine,
  deploymentPhaseOf,
  phaseOf,
} from '../monitoring/StateMachine.js';

function sequence(states: string[]): (signal: AbortSignal) => Promise<string> {
  let index = 0;
  return async () => states[Math.min(index++, states.length - 1)];
}

describe('Poller', () => {
  it('should stop at the first final value', async () => {
    const poller = new Poller({ intervalMs: 1, timeoutMs: 1000 });
    const fetch = vi.fn(sequence(['waiting', 'waiting', 'running']));
    const onUpdate = vi.fn();

    const result = await poller.poll({
      subject: 'nancy/1',
      fetch,
      isDone: (state) => state === 'running',
      stateOf: (state) => state,
      onUpdate,
    });

    expect(result).toBe('running');
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(onUpdate.mock.calls.map((call) => call[0])).toEqual(['waiting', 'waiting', 'running']);
    expect(poller.isPolling()).toBe(false);
  });

  it('should propagate errors thrown by the inspection', async () => {
    const poller = new Poller({ intervalMs: 1, timeoutMs: 1000 });

    await expect(poller.poll({
      subject: 'nancy/1',
      fetch: sequence(['waiting', 'error']),
      isDone: (state) => {
        if (state === 'error') throw new Error('failed');
        return false;
      },
      stateOf: (state) => state,
    })).rejects.toThrow('failed');
  });

  it('should time out with the last observed state', async () => {
    const poller = new Poller({ intervalMs: 5, timeoutMs: 30 });

    const error = await poller.poll({
      subject: 'nancy/1',
      fetch: sequence(['waiting']),
      isDone: () => false,
      stateOf: (state) => state,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimedOutError);
    expect(error).toHaveProperty('lastState', 'waiting');
    expect(error).toHaveProperty('subject', 'nancy/1');
  });

  it('should abort an in-flight fetch at the deadline', async () => {
    const poller = new Poller({ intervalMs: 5, timeoutMs: 20 });
    const fetch = (signal: AbortSignal): Promise<string> =>
      new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new TransportError('aborted', { aborted: true })));
      });

    await expect(poller.poll({
      subject: 'nancy/2',
      fetch,
      isDone: () => false,
      stateOf: (state) => state,
    })).rejects.toBeInstanceOf(TimedOutError);
  });

  it('should honour a caller signal', async () => {
    const poller = new Poller({ intervalMs: 10_000, timeoutMs: 60_000 });
    const controller = new AbortController();

    const pending = poller.poll({
      subject: 'nancy/3',
      fetch: sequence(['waiting']),
      isDone: () => false,
      stateOf: (state) => state,
      onUpdate: () => controller.abort(),
    }, controller.signal);

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('kind', 'aborted');
  });

  it('should stop on request', async () => {
    const poller = new Poller({ intervalMs: 10_000, timeoutMs: 60_000 });

    const pending = poller.poll({
      subject: 'nancy/4',
      fetch: sequence(['waiting']),
      isDone: () => false,
      stateOf: (state) => state,
      onUpdate: () => poller.stop(),
    });

    await expect(pending).rejects.toBeInstanceOf(TransportError);
  });
});

describe('ReservationStateMachine', () => {
  it('should map service states to phases', () => {
    expect(phaseOf('waiting')).toBe('waiting');
    expect(phaseOf('toLaunch')).toBe('waiting');
    expect(phaseOf('launching')).toBe('launching');
    expect(phaseOf('running')).toBe('running');
    expect(phaseOf('terminated')).toBe('finishing');
    expect(phaseOf('error')).toBe('error');
  });

  it('should record transitions', () => {
    const machine = new ReservationStateMachine();

    expect(machine.observe('waiting')).toBe(true);
    expect(machine.observe('waiting')).toBe(false);
    expect(machine.observe('running')).toBe(true);

    expect(machine.getState()).toBe('running');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.hasFailed()).toBe(false);
    expect(machine.getHistory().map((t) => `${t.from}->${t.to}`)).toEqual([
      'submitted->waiting',
      'waiting->running',
    ]);
  });

  it('should keep terminal phases', () => {
    const machine = new ReservationStateMachine('waiting');

    expect(machine.observe('finishing')).toBe(true);
    expect(machine.observe('running')).toBe(false);

    expect(machine.getState()).toBe('finishing');
    expect(machine.hasFailed()).toBe(true);
  });

  it('should not move back from launching to waiting', () => {
    const machine = new ReservationStateMachine('launching');
    expect(machine.canTransitionTo('waiting')).toBe(false);
  });
});

describe('DeploymentStateMachine', () => {
  it('should map statuses to phases', () => {
    expect(deploymentPhaseOf('processing')).toBe('in_progress');
    expect(deploymentPhaseOf('terminated')).toBe('complete');
    expect(deploymentPhaseOf('terminated', true)).toBe('error');
    expect(deploymentPhaseOf('canceled')).toBe('error');
  });

  it('should move from requested to complete', () => {
    const machine = new DeploymentStateMachine();

    expect(machine.observe('processing')).toBe(true);
    expect(machine.observe('terminated')).toBe(true);
    expect(machine.observe('processing')).toBe(false);

    expect(machine.getState()).toBe('complete');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory()).toHaveLength(2);
  });
});
