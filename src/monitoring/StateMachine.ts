/**
 * Reservation and deployment state machines.
 *
 * Track the states observed while polling and validate the transitions.
 * @module monitoring/StateMachine
 */

import { DeploymentStatus } from '../types/deployment.js';
import { JobState } from '../types/job.js';

export interface StateTransition<T> {
  from: T;
  to: T;
  timestamp: Date;
}

/**
 * Local view of a reservation. `submitted` exists only on the client side.
 */
export type ReservationPhase =
  | 'submitted'
  | 'waiting'
  | 'launching'
  | 'running'
  | 'finishing'
  | 'error';

const VALID_RESERVATION_TRANSITIONS: Map<ReservationPhase, ReservationPhase[]> = new Map([
  ['submitted', ['waiting', 'launching', 'running', 'finishing', 'error']],
  ['waiting', ['launching', 'running', 'finishing', 'error']],
  ['launching', ['running', 'finishing', 'error']],
]);

const TERMINAL_RESERVATION_PHASES: readonly ReservationPhase[] = ['running', 'finishing', 'error'];

/**
 * Maps a service job state onto a phase. `terminated` is folded into
 * `finishing`; unknown states count as `waiting`.
 */
export function phaseOf(state: string): ReservationPhase {
  switch (state) {
    case JobState.Launching:
      return 'launching';
    case JobState.Running:
      return 'running';
    case JobState.Finishing:
    case JobState.Terminated:
      return 'finishing';
    case JobState.Error:
      return 'error';
    default:
      return 'waiting';
  }
}

export class ReservationStateMachine {
  private currentState: ReservationPhase;
  private readonly history: StateTransition<ReservationPhase>[] = [];

  constructor(initialState: ReservationPhase = 'submitted') {
    this.currentState = initialState;
  }

  /**
   * Records a service state. Repeats and invalid moves leave the machine
   * unchanged and return false; terminal phases are sticky.
   */
  observe(state: string): boolean {
    return this.transition(phaseOf(state));
  }

  transition(newState: ReservationPhase): boolean {
    if (!this.canTransitionTo(newState)) {
      return false;
    }

    this.history.push({
      from: this.currentState,
      to: newState,
      timestamp: new Date(),
    });

    this.currentState = newState;
    return true;
  }

  getState(): ReservationPhase {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<StateTransition<ReservationPhase>> {
    return [...this.history];
  }

  isTerminal(): boolean {
    return TERMINAL_RESERVATION_PHASES.includes(this.currentState);
  }

  /** True when the reservation ended without running */
  hasFailed(): boolean {
    return this.currentState === 'finishing' || this.currentState === 'error';
  }

  canTransitionTo(newState: ReservationPhase): boolean {
    const validTransitions = VALID_RESERVATION_TRANSITIONS.get(this.currentState);
    return validTransitions?.includes(newState) ?? false;
  }
}

export type DeploymentPhase = 'requested' | 'in_progress' | 'complete' | 'error';

const VALID_DEPLOYMENT_TRANSITIONS: Map<DeploymentPhase, DeploymentPhase[]> = new Map([
  ['requested', ['in_progress', 'complete', 'error']],
  ['in_progress', ['complete', 'error']],
]);

/**
 * Maps a deployment status onto a phase. A terminated deployment with failed
 * nodes is an error.
 */
export function deploymentPhaseOf(status: string, hasFailures = false): DeploymentPhase {
  switch (status) {
    case DeploymentStatus.Processing:
      return 'in_progress';
    case DeploymentStatus.Terminated:
      return hasFailures ? 'error' : 'complete';
    default:
      return 'error';
  }
}

export class DeploymentStateMachine {
  private currentState: DeploymentPhase = 'requested';
  private readonly history: StateTransition<DeploymentPhase>[] = [];

  observe(status: string, hasFailures = false): boolean {
    return this.transition(deploymentPhaseOf(status, hasFailures));
  }

  transition(newState: DeploymentPhase): boolean {
    const validTransitions = VALID_DEPLOYMENT_TRANSITIONS.get(this.currentState);
    if (!validTransitions || !validTransitions.includes(newState)) {
      return false;
    }

    this.history.push({
      from: this.currentState,
      to: newState,
      timestamp: new Date(),
    });

    this.currentState = newState;
    return true;
  }

  getState(): DeploymentPhase {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<StateTransition<DeploymentPhase>> {
    return [...this.history];
  }

  isTerminal(): boolean {
    return this.currentState === 'complete' || this.currentState === 'error';
  }
}
