/**
 * Polling and state tracking
 * @module monitoring
 */

export {
  Poller,
  DEFAULT_POLLER_CONFIG,
  type PollerConfig,
  type PollTask,
} from './Poller.js';

export {
  ReservationStateMachine,
  DeploymentStateMachine,
  phaseOf,
  deploymentPhaseOf,
  type ReservationPhase,
  type DeploymentPhase,
  type StateTransition,
} from './StateMachine.js';
